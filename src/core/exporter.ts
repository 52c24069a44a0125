/**
 * Candidate export
 * Writes a completed application as JSON, CSV or a markdown report
 */

import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExportFormat } from './config.js';
import { ExportError } from './error-recovery.js';
import type { CandidateRecord } from './session.js';
import { generateCandidateReport } from './summary.js';

export type { ExportFormat } from './config.js';

/**
 * Record as written to disk, with a submission time and a hash of the email
 */
export interface SanitizedCandidate extends CandidateRecord {
  submittedAt: string;
  emailHash?: string;
}

export interface ExportOptions {
  /** Directory the file is written to; created when missing */
  outputDir: string;
  /** Submission time used in the file name and the exported data */
  now?: Date;
}

export interface ExportResult {
  success: boolean;
  path?: string;
  error?: ExportError;
}

const EXTENSIONS: Record<ExportFormat, string> = {
  json: 'json',
  csv: 'csv',
  markdown: 'md',
};

/**
 * First 16 hex characters of the SHA-256 of the value
 */
export function hashSensitiveData(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex').slice(0, 16);
}

export function sanitizeCandidateRecord(record: CandidateRecord, submittedAt: Date = new Date()): SanitizedCandidate {
  const sanitized: SanitizedCandidate = { ...record, submittedAt: submittedAt.toISOString() };

  if (record.techStack) {
    sanitized.techStack = record.techStack.map((tech) => tech.trim());
  }
  if (record.email) {
    sanitized.emailHash = hashSensitiveData(record.email);
  }

  return sanitized;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * candidate_<Name_With_Underscores>_<YYYYMMDD_HHMMSS>.<ext>
 */
export function buildExportFilename(record: CandidateRecord, format: ExportFormat, date: Date): string {
  const name = (record.name ?? 'candidate')
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_.-]/gu, '');
  return `candidate_${name || 'candidate'}_${formatFileTimestamp(date)}.${EXTENSIONS[format]}`;
}

export function formatJSON(candidate: SanitizedCandidate): string {
  return JSON.stringify(candidate, null, 2) + '\n';
}

export const csvEscape = (value: string): string => {
  if (value.includes(',') || value.includes('\n') || value.includes('"') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
};

function csvValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Two-column CSV with one row per field
 */
export function formatCSV(candidate: SanitizedCandidate): string {
  const rows = [['Field', 'Value']];
  for (const [field, value] of Object.entries(candidate)) {
    rows.push([field, csvValue(value)]);
  }
  return rows.map((row) => row.map(csvEscape).join(',')).join('\n') + '\n';
}

export function renderExport(record: CandidateRecord, format: ExportFormat, now: Date): string {
  switch (format) {
    case 'json':
      return formatJSON(sanitizeCandidateRecord(record, now));
    case 'csv':
      return formatCSV(sanitizeCandidateRecord(record, now));
    case 'markdown':
      return generateCandidateReport(record, now);
  }
}

/**
 * Write the record to a new file in the output directory. I/O failures are
 * reported in the result, never thrown.
 */
export async function exportCandidate(
  record: CandidateRecord,
  format: ExportFormat,
  options: ExportOptions
): Promise<ExportResult> {
  const now = options.now ?? new Date();
  const path = join(options.outputDir, buildExportFilename(record, format, now));

  try {
    await mkdir(options.outputDir, { recursive: true });
    await writeFile(path, renderExport(record, format, now), 'utf-8');
    return { success: true, path };
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    const message = cause ? cause.message : String(error);
    return { success: false, error: new ExportError(`Failed to export ${format}: ${message}`, cause) };
  }
}
