/**
 * Session management for the intake conversation
 * Creates, resets and persists session state so an interrupted intake can be resumed
 */

import { readFile, writeFile, mkdir, access, unlink } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import { STAGES, isStage, type Stage } from './stages.js';

/**
 * Answers collected so far. A field is present only once its stage has been completed.
 */
export interface CandidateRecord {
  name?: string;
  email?: string;
  phone?: string;
  /** Years of professional experience */
  experience?: number;
  position?: string;
  location?: string;
  /** Deduplicated, title-cased technologies (at most 10) */
  techStack?: string[];
  technicalQuestions?: string[];
  technicalAnswers?: string;
}

/**
 * Per-session state passed into and returned from the conversation driver
 */
export interface SessionState {
  /** Version of the state format for future migrations */
  version: 1;
  /** Stage currently awaiting an answer */
  stage: Stage;
  /** Answers collected so far */
  record: CandidateRecord;
  /** Consecutive failed attempts in the current stage */
  errorCount: number;
  /** Whether the candidate has answered at least one question */
  conversationStarted: boolean;
  /** Session start timestamp */
  startedAt: string;
  /** Last update timestamp */
  updatedAt: string;
}

export interface SessionValidationError {
  field: string;
  message: string;
}

export interface SessionResult {
  state: SessionState;
  sessionPath: string;
}

const CURRENT_SESSION_VERSION = 1;

const STRING_FIELDS = ['name', 'email', 'phone', 'position', 'location', 'technicalAnswers'] as const;
const LIST_FIELDS = ['techStack', 'technicalQuestions'] as const;

/**
 * Get the path to the session file
 */
export function getSessionPath(baseDir: string = process.cwd()): string {
  return join(baseDir, 'intake', 'session.yaml');
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a saved session exists
 */
export async function hasSession(baseDir: string = process.cwd()): Promise<boolean> {
  return fileExists(getSessionPath(baseDir));
}

/**
 * Create a fresh session at the first stage
 */
export function createSession(now: Date = new Date()): SessionState {
  const timestamp = now.toISOString();
  return {
    version: CURRENT_SESSION_VERSION,
    stage: 'name',
    record: {},
    errorCount: 0,
    conversationStarted: false,
    startedAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Discard everything collected and start over
 */
export function resetSession(now: Date = new Date()): SessionState {
  return createSession(now);
}

function validateRecord(record: unknown): SessionValidationError[] {
  const errors: SessionValidationError[] = [];

  if (record === null || typeof record !== 'object' || Array.isArray(record)) {
    errors.push({ field: 'record', message: 'record must be an object' });
    return errors;
  }

  const r = record as Record<string, unknown>;

  for (const field of STRING_FIELDS) {
    if (r[field] !== undefined && typeof r[field] !== 'string') {
      errors.push({ field: `record.${field}`, message: 'must be a string' });
    }
  }

  if (r.experience !== undefined) {
    if (typeof r.experience !== 'number' || !Number.isFinite(r.experience) || r.experience < 0) {
      errors.push({ field: 'record.experience', message: 'must be a non-negative number' });
    }
  }

  for (const field of LIST_FIELDS) {
    const value = r[field];
    if (value === undefined) continue;
    if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
      errors.push({ field: `record.${field}`, message: 'must be an array of strings' });
    }
  }

  return errors;
}

/**
 * Validate a session object
 * Returns an array of validation errors (empty if valid)
 */
export function validateSession(state: unknown): SessionValidationError[] {
  const errors: SessionValidationError[] = [];

  if (state === null || typeof state !== 'object') {
    errors.push({ field: 'root', message: 'Session must be an object' });
    return errors;
  }

  const s = state as Record<string, unknown>;

  if (s.version === undefined) {
    errors.push({ field: 'version', message: 'version is required' });
  } else if (s.version !== CURRENT_SESSION_VERSION) {
    errors.push({ field: 'version', message: `version must be ${CURRENT_SESSION_VERSION}` });
  }

  if (s.stage === undefined) {
    errors.push({ field: 'stage', message: 'stage is required' });
  } else if (typeof s.stage !== 'string' || !isStage(s.stage)) {
    errors.push({ field: 'stage', message: `stage must be one of: ${STAGES.join(', ')}` });
  }

  if (s.record === undefined) {
    errors.push({ field: 'record', message: 'record is required' });
  } else {
    errors.push(...validateRecord(s.record));
  }

  if (s.errorCount === undefined) {
    errors.push({ field: 'errorCount', message: 'errorCount is required' });
  } else if (
    typeof s.errorCount !== 'number' ||
    !Number.isInteger(s.errorCount) ||
    s.errorCount < 0
  ) {
    errors.push({ field: 'errorCount', message: 'errorCount must be a non-negative integer' });
  }

  if (s.conversationStarted === undefined) {
    errors.push({ field: 'conversationStarted', message: 'conversationStarted is required' });
  } else if (typeof s.conversationStarted !== 'boolean') {
    errors.push({ field: 'conversationStarted', message: 'conversationStarted must be a boolean' });
  }

  for (const field of ['startedAt', 'updatedAt'] as const) {
    if (s[field] === undefined) {
      errors.push({ field, message: `${field} is required` });
    } else if (typeof s[field] !== 'string') {
      errors.push({ field, message: `${field} must be a string` });
    }
  }

  return errors;
}

/**
 * Load a session from disk
 * Returns null if no session exists
 * Throws if the session file is corrupted
 */
export async function loadSession(baseDir: string = process.cwd()): Promise<SessionResult | null> {
  const sessionPath = getSessionPath(baseDir);

  if (!(await fileExists(sessionPath))) {
    return null;
  }

  let content: string;
  try {
    content = await readFile(sessionPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Failed to read session file: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Corrupted session file (invalid YAML): ${message}`);
  }

  const errors = validateSession(parsed);
  if (errors.length > 0) {
    const errorMessages = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new Error(`Corrupted session file (invalid data):\n${errorMessages}`);
  }

  return {
    state: parsed as SessionState,
    sessionPath,
  };
}

/**
 * Save a session to disk
 */
export async function saveSession(
  state: SessionState,
  baseDir: string = process.cwd()
): Promise<string> {
  const sessionPath = getSessionPath(baseDir);

  await mkdir(dirname(sessionPath), { recursive: true });

  const errors = validateSession(state);
  if (errors.length > 0) {
    const errorMessages = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new Error(`Cannot save invalid session:\n${errorMessages}`);
  }

  const stateToSave: SessionState = {
    ...state,
    updatedAt: new Date().toISOString(),
  };

  const yamlContent = stringify(stateToSave, {
    lineWidth: 0,
  });

  const contentWithHeader = `# Candidate Intake Session
# This file stores the progress of an unfinished intake. Delete to start fresh.
# DO NOT edit manually.

${yamlContent}`;

  await writeFile(sessionPath, contentWithHeader, 'utf-8');
  return sessionPath;
}

/**
 * Delete the session file
 */
export async function clearSession(baseDir: string = process.cwd()): Promise<boolean> {
  const sessionPath = getSessionPath(baseDir);

  if (!(await fileExists(sessionPath))) {
    return false;
  }

  await unlink(sessionPath);
  return true;
}
