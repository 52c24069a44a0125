/**
 * Technical question generation
 * A provider writes questions for the candidate's tech stack; the built-in table
 * answers whenever the provider is unavailable, slow or returns unusable text.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Logger, ILogObj } from 'tslog';
import { TtlCache } from './cache.js';
import type { IntakeConfig } from './config.js';
import { classifyError, ProviderError, withRetry, withTimeout } from './error-recovery.js';
import { providerRegistry, type ProviderRegistry, type QuestionProvider } from '../providers/index.js';
import { getLogger } from '../utils/logger.js';

export const MIN_QUESTIONS = 3;
export const MAX_QUESTIONS = 5;

const FALLBACK_TECH_LIMIT = 3;
const FALLBACK_PER_TECH = 2;
const MIN_QUESTION_LENGTH = 10;

export type QuestionSource = 'provider' | 'fallback' | 'cache';

export interface QuestionSet {
  questions: string[];
  source: QuestionSource;
}

/**
 * Produces 3 to 5 questions for a tech stack. Never rejects.
 */
export interface QuestionGenerator {
  readonly name: string;
  generate(techStack: readonly string[]): Promise<QuestionSet>;
}

export const QUESTION_SYSTEM_PROMPT = `You are a technical interviewer for a technology recruitment team.
Your role is to generate relevant and challenging technical questions based on candidates' tech stacks.
Focus on fundamental understanding, practical application, and problem-solving abilities.`;

export function buildQuestionPrompt(techStack: readonly string[]): string {
  return `Based on the candidate's tech stack: ${techStack.join(', ')}

Generate exactly 4-5 relevant technical questions that:
1. Assess fundamental understanding of core concepts
2. Test practical application and real-world usage
3. Evaluate problem-solving and debugging abilities
4. Explore best practices and optimization techniques

Requirements:
- Each question should be specific to the mentioned technologies
- Questions should be appropriate for different experience levels
- Format as a numbered list with one question per line
- Each question should end with a question mark`;
}

// Fallback table ----------------------------------------------------------------

export interface FallbackTable {
  /** Questions keyed by lower-case technology name */
  technologies: Record<string, string[]>;
  /** Filler lines; "{tech}" is replaced by the first technology */
  generic: string[];
}

const FALLBACK_TABLE_URL = new URL('../../data/fallback-questions.json', import.meta.url);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Check the shape of a parsed fallback table
 */
export function isFallbackTable(value: unknown): value is FallbackTable {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const table = value as Record<string, unknown>;
  const technologies = table.technologies;
  return (
    isStringArray(table.generic) &&
    technologies !== null &&
    typeof technologies === 'object' &&
    Object.values(technologies).every(isStringArray)
  );
}

/**
 * Read the built-in fallback table shipped in data/fallback-questions.json
 * @throws Error if the file is missing or malformed
 */
export function loadFallbackTable(path: string = fileURLToPath(FALLBACK_TABLE_URL)): FallbackTable {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isFallbackTable(parsed)) {
    throw new Error(`Malformed fallback question table: ${path}`);
  }
  return parsed;
}

let defaultTable: FallbackTable | null = null;

function getDefaultTable(): FallbackTable {
  if (!defaultTable) {
    defaultTable = loadFallbackTable();
  }
  return defaultTable;
}

/**
 * Questions from the built-in table: up to two for each of the first three
 * technologies, padded with generic filler to at least three, capped at five
 */
export function getFallbackQuestions(
  techStack: readonly string[],
  table: FallbackTable = getDefaultTable()
): string[] {
  const questions: string[] = [];

  for (const tech of techStack.slice(0, FALLBACK_TECH_LIMIT)) {
    const key = tech.toLowerCase();
    const entry = Object.hasOwn(table.technologies, key) ? table.technologies[key] : undefined;
    if (entry) {
      questions.push(...entry.slice(0, FALLBACK_PER_TECH));
    }
  }

  const primary = techStack[0] ?? 'your primary technology';
  const filler = table.generic.map((line) => line.replaceAll('{tech}', primary));

  if (questions.length === 0) {
    questions.push(...filler);
  }

  for (const line of filler) {
    if (questions.length >= MIN_QUESTIONS) break;
    if (!questions.includes(line)) {
      questions.push(line);
    }
  }

  return questions.slice(0, MAX_QUESTIONS);
}

// Reply parsing -----------------------------------------------------------------

const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s*/;

/**
 * Pull usable question lines out of a free-form reply
 */
export function extractQuestions(reply: string): string[] {
  const seen = new Set<string>();
  const questions: string[] = [];

  for (const rawLine of reply.split('\n')) {
    const line = rawLine.replace(LIST_MARKER, '').trim();
    if (line.length <= MIN_QUESTION_LENGTH || !line.includes('?')) continue;

    const key = line.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    questions.push(line);
  }

  return questions.slice(0, MAX_QUESTIONS);
}

// Generators --------------------------------------------------------------------

export class FallbackQuestionGenerator implements QuestionGenerator {
  readonly name = 'static';

  constructor(private readonly table: FallbackTable = getDefaultTable()) {}

  async generate(techStack: readonly string[]): Promise<QuestionSet> {
    return { questions: getFallbackQuestions(techStack, this.table), source: 'fallback' };
  }
}

export interface ProviderQuestionGeneratorOptions {
  timeoutMs: number;
  maxAttempts: number;
  /** Delay before the second attempt; doubles after that */
  retryDelayMs?: number;
  fallback?: QuestionGenerator;
  logger?: Logger<ILogObj>;
}

export class ProviderQuestionGenerator implements QuestionGenerator {
  private readonly fallback: QuestionGenerator;
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly provider: QuestionProvider,
    private readonly options: ProviderQuestionGeneratorOptions
  ) {
    this.fallback = options.fallback ?? new FallbackQuestionGenerator();
    this.logger = options.logger ?? getLogger();
  }

  get name(): string {
    return this.provider.name;
  }

  async generate(techStack: readonly string[]): Promise<QuestionSet> {
    try {
      const reply = await withTimeout(
        (signal) =>
          withRetry(
            () =>
              this.provider.complete({
                systemPrompt: QUESTION_SYSTEM_PROMPT,
                prompt: buildQuestionPrompt(techStack),
                signal,
              }),
            {
              maxAttempts: this.options.maxAttempts,
              initialDelayMs: this.options.retryDelayMs ?? 1000,
              signal,
              onRetry: (attempt, error, delayMs) => {
                this.logger.warn(
                  `${this.provider.displayName} attempt ${attempt} failed (${error.category}): ${error.message}; retrying in ${delayMs}ms`
                );
              },
            }
          ),
        this.options.timeoutMs,
        `${this.provider.displayName} question generation`
      );

      const questions = extractQuestions(reply);
      if (questions.length < MIN_QUESTIONS) {
        throw new ProviderError(
          `${this.provider.displayName} returned ${questions.length} usable questions`,
          undefined,
          { reply }
        );
      }

      this.logger.debug(`Generated ${questions.length} questions with ${this.provider.displayName}`);
      return { questions, source: 'provider' };
    } catch (error) {
      const classified = classifyError(error);
      this.logger.warn(
        `Question generation failed (${classified.category}): ${classified.message}; using built-in questions`
      );
      return this.fallback.generate(techStack);
    }
  }
}

/**
 * Reuses provider output for a tech stack until the entry expires.
 * Fallback results are not stored, so the next request tries the provider again.
 */
export class CachedQuestionGenerator implements QuestionGenerator {
  constructor(
    private readonly inner: QuestionGenerator,
    private readonly cache: TtlCache<string, string[]>
  ) {}

  get name(): string {
    return this.inner.name;
  }

  static cacheKey(techStack: readonly string[]): string {
    return techStack.map((tech) => tech.toLowerCase()).join(',');
  }

  async generate(techStack: readonly string[]): Promise<QuestionSet> {
    const key = CachedQuestionGenerator.cacheKey(techStack);
    const cached = this.cache.get(key);
    if (cached) {
      return { questions: [...cached], source: 'cache' };
    }

    const result = await this.inner.generate(techStack);
    if (result.source === 'provider') {
      this.cache.set(key, [...result.questions]);
    }
    return result;
  }
}

export interface QuestionGeneratorDeps {
  registry?: ProviderRegistry;
  logger?: Logger<ILogObj>;
  fallbackTable?: FallbackTable;
  /** Clock for cache expiry */
  now?: () => number;
  retryDelayMs?: number;
}

export type QuestionGeneratorConfig = Pick<
  IntakeConfig,
  'questionProvider' | 'model' | 'timeoutMs' | 'maxAttempts' | 'cacheTtlSeconds'
>;

/**
 * Choose the question generator for a run
 */
export async function createQuestionGenerator(
  config: QuestionGeneratorConfig,
  deps: QuestionGeneratorDeps = {}
): Promise<QuestionGenerator> {
  const logger = deps.logger ?? getLogger();
  const fallback = new FallbackQuestionGenerator(deps.fallbackTable ?? getDefaultTable());

  if (config.questionProvider === 'static') {
    return fallback;
  }

  const registry = deps.registry ?? providerRegistry;
  // model only applies to the API-backed provider; claude runs with its own default
  const provider = registry.get(
    config.questionProvider,
    config.questionProvider === 'openai' ? { model: config.model } : {}
  );

  if (!(await provider.isAvailable())) {
    logger.warn(`${provider.displayName} is not available; using built-in questions`);
    return fallback;
  }

  const generator = new ProviderQuestionGenerator(provider, {
    timeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    retryDelayMs: deps.retryDelayMs,
    fallback,
    logger,
  });

  if (config.cacheTtlSeconds <= 0) {
    return generator;
  }

  return new CachedQuestionGenerator(
    generator,
    new TtlCache<string, string[]>({ ttlMs: config.cacheTtlSeconds * 1000, now: deps.now })
  );
}
