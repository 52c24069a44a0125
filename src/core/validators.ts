/**
 * Field validators for candidate answers
 * All functions are pure and never throw
 */

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const PHONE_PATTERN = /^\+?1?\d{9,15}$/;

/**
 * Words that end the conversation from any stage
 */
export const EXIT_KEYWORDS = ['quit', 'exit', 'bye', 'goodbye', 'end', 'stop', 'finish', 'done'] as const;

export const MAX_TECH_STACK = 10;

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const TECH_SEPARATORS = /[;|\n]/g;

export type ExperienceResult = { valid: true; years: number } | { valid: false; years: null };

/**
 * Check if the user wants to leave the conversation
 */
export function isExitCommand(text: string): boolean {
  const normalized = text.trim().toLowerCase();
  return EXIT_KEYWORDS.some((keyword) => keyword === normalized);
}

export function validateEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email.trim());
}

export function validatePhone(phone: string): boolean {
  return PHONE_PATTERN.test(phone.trim());
}

/**
 * Parse years of experience, accepting forms like "3", "2.5 years" or "1 year"
 */
export function validateExperience(experience: string): ExperienceResult {
  const cleaned = experience.replace(/years/gi, '').replace(/year/gi, '').trim();
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return { valid: false, years: null };
  }

  const years = Number(cleaned);
  if (!Number.isFinite(years) || years < 0) {
    return { valid: false, years: null };
  }

  // Normalizes -0
  return { valid: true, years: years + 0 };
}

/**
 * Check that trimmed text has at least `min` characters
 */
export function hasMinLength(text: string, min: number): boolean {
  return text.trim().length >= min;
}

/**
 * Upper-case the first letter of every alphabetic run and lower-case the rest,
 * so "node.js" becomes "Node.Js" and "c++" becomes "C++"
 */
export function titleCase(text: string): string {
  return text.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}

/**
 * Parse a free-form technology list into a clean, deduplicated list
 */
export function parseTechStack(input: string): string[] {
  if (!input.trim()) {
    return [];
  }

  const tokens = input
    .replace(TECH_SEPARATORS, ',')
    .split(',')
    .map((token) => titleCase(token.trim()))
    .filter((token) => [...token].length > 1);

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const token of tokens) {
    const key = token.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(token);
    }
  }

  return unique.slice(0, MAX_TECH_STACK);
}
