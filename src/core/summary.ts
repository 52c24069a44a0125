/**
 * Candidate summaries
 * Plain-text summary shown when the intake completes, and a markdown report for export
 */

import type { CandidateRecord } from './session.js';

const NOT_AVAILABLE = 'N/A';
const RULE = '------------------------';

/**
 * Fields a complete application must have
 */
export const REQUIRED_FIELDS = [
  'name',
  'email',
  'phone',
  'experience',
  'position',
  'location',
  'techStack',
] as const satisfies ReadonlyArray<keyof CandidateRecord>;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export const FIELD_LABELS: Record<keyof CandidateRecord, string> = {
  name: 'Full Name',
  email: 'Email',
  phone: 'Phone',
  experience: 'Experience',
  position: 'Desired Position',
  location: 'Location',
  techStack: 'Tech Stack',
  technicalQuestions: 'Technical Questions',
  technicalAnswers: 'Technical Answers',
};

export function formatExperience(years: number | undefined): string {
  if (years === undefined) return NOT_AVAILABLE;
  return `${years} ${years === 1 ? 'year' : 'years'}`;
}

function orNA(value: string | undefined): string {
  return value === undefined || value.trim() === '' ? NOT_AVAILABLE : value;
}

function joinList(values: readonly string[] | undefined): string {
  return values && values.length > 0 ? values.join(', ') : NOT_AVAILABLE;
}

export function numberQuestions(questions: readonly string[]): string[] {
  return questions.map((question, index) => `${index + 1}. ${question}`);
}

/**
 * Render the end-of-intake summary. Absent fields show as N/A.
 */
export function formatCandidateSummary(record: CandidateRecord): string {
  const questions = record.technicalQuestions ?? [];

  return [
    '📋 Candidate Summary:',
    RULE,
    `${FIELD_LABELS.name}: ${orNA(record.name)}`,
    `${FIELD_LABELS.email}: ${orNA(record.email)}`,
    `${FIELD_LABELS.phone}: ${orNA(record.phone)}`,
    `${FIELD_LABELS.experience}: ${formatExperience(record.experience)}`,
    `${FIELD_LABELS.position}: ${orNA(record.position)}`,
    `${FIELD_LABELS.location}: ${orNA(record.location)}`,
    `${FIELD_LABELS.techStack}: ${joinList(record.techStack)}`,
    '',
    '🔍 Technical Assessment:',
    RULE,
    ...(questions.length > 0 ? numberQuestions(questions) : [NOT_AVAILABLE]),
    '',
    'Your Answers:',
    RULE,
    orNA(record.technicalAnswers),
    '',
    'Thank you for completing the initial screening! Our team will review your information and get back to you soon.',
  ].join('\n');
}

/**
 * List the required fields that are missing or empty
 */
export function validateDataCompleteness(record: CandidateRecord): RequiredField[] {
  return REQUIRED_FIELDS.filter((field) => {
    const value = record[field];
    if (value === undefined) return true;
    if (typeof value === 'string') return value.trim() === '';
    if (Array.isArray(value)) return value.length === 0;
    return false;
  });
}

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Render a markdown report of the candidate
 */
export function generateCandidateReport(record: CandidateRecord, generatedAt: Date = new Date()): string {
  const lines: string[] = [];
  const questions = record.technicalQuestions ?? [];
  const missing = validateDataCompleteness(record);

  lines.push(`# Candidate Report: ${record.name ?? 'Unknown Candidate'}`);
  lines.push('');
  lines.push(`_Generated: ${generatedAt.toISOString()}_`);
  lines.push('');

  lines.push('## Contact Information');
  lines.push('');
  lines.push('| Field | Value |');
  lines.push('|---|---|');
  for (const field of ['name', 'email', 'phone', 'location'] as const) {
    lines.push(`| ${FIELD_LABELS[field]} | ${escapeTableCell(orNA(record[field]))} |`);
  }
  lines.push('');

  lines.push('## Professional Background');
  lines.push('');
  lines.push(`- **${FIELD_LABELS.experience}:** ${formatExperience(record.experience)}`);
  lines.push(`- **${FIELD_LABELS.position}:** ${orNA(record.position)}`);
  lines.push(`- **${FIELD_LABELS.techStack}:** ${joinList(record.techStack)}`);
  lines.push('');

  lines.push('## Technical Assessment');
  lines.push('');
  lines.push('### Questions');
  lines.push('');
  if (questions.length > 0) {
    lines.push(...numberQuestions(questions));
  } else {
    lines.push('_No questions were generated._');
  }
  lines.push('');
  lines.push('### Answers');
  lines.push('');
  lines.push(orNA(record.technicalAnswers));
  lines.push('');

  lines.push('## Missing Information');
  lines.push('');
  if (missing.length > 0) {
    for (const field of missing) {
      lines.push(`- ${FIELD_LABELS[field]}`);
    }
  } else {
    lines.push('All required information was provided.');
  }

  return lines.join('\n') + '\n';
}
