/**
 * Error taxonomy and recovery helpers
 * Classifies failures, retries transient ones and bounds slow operations
 */

import { saveSession, type SessionState } from './session.js';

/**
 * Error categories for intake errors
 */
export type ErrorCategory =
  | 'network'
  | 'provider'
  | 'process'
  | 'timeout'
  | 'state'
  | 'export'
  | 'validation'
  | 'user_cancelled'
  | 'unknown';

/**
 * Detailed intake error with recovery information
 */
export class IntakeError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** Whether the intake can be resumed after this error */
  readonly recoverable: boolean;
  /** Timestamp when the error occurred */
  readonly timestamp: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    options: {
      recoverable?: boolean;
      cause?: Error;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'IntakeError';
    this.category = category;
    this.recoverable = options.recoverable ?? true;
    this.timestamp = new Date().toISOString();
    this.context = options.context;
  }

  /**
   * What the user can do next
   */
  getRecoveryInstructions(): string {
    const resume = 'Your progress has been saved. Run "intake --resume" to continue where you left off.';
    const instructions: Record<ErrorCategory, string> = {
      network: resume,
      provider: resume,
      process: resume,
      timeout: resume,
      state: 'The saved session cannot be used. Delete ./intake/session.yaml and start a new intake.',
      export: 'Check that the output directory is writable, then run "/export" again.',
      validation: 'Fix the listed settings in ./intake/config.yaml or on the command line, then try again.',
      user_cancelled: resume,
      unknown: 'Your progress may have been saved. Run "intake --resume" to attempt to continue.',
    };
    return instructions[this.category];
  }
}

/**
 * Network-related error (connection issues, DNS failures, etc.)
 */
export class NetworkError extends IntakeError {
  constructor(message: string, cause?: Error) {
    super(message, 'network', { recoverable: true, cause });
    this.name = 'NetworkError';
  }
}

/**
 * Provider-related error (API errors, rate limits, unusable output)
 */
export class ProviderError extends IntakeError {
  constructor(message: string, cause?: Error, context?: Record<string, unknown>) {
    super(message, 'provider', { recoverable: true, cause, context });
    this.name = 'ProviderError';
  }
}

/**
 * Child process error (crashed CLI, non-zero exit, signals)
 */
export class ProcessError extends IntakeError {
  readonly exitCode?: number;
  readonly signal?: string;

  constructor(
    message: string,
    options: { exitCode?: number; signal?: string; cause?: Error } = {}
  ) {
    super(message, 'process', { recoverable: true, cause: options.cause });
    this.name = 'ProcessError';
    this.exitCode = options.exitCode;
    this.signal = options.signal;
  }
}

/**
 * Timeout error (operation took too long)
 */
export class TimeoutError extends IntakeError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, 'timeout', { recoverable: true, context: { timeoutMs } });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Session-related error (save/load failures)
 */
export class StateError extends IntakeError {
  constructor(message: string, cause?: Error) {
    super(message, 'state', { recoverable: false, cause });
    this.name = 'StateError';
  }
}

/**
 * Export-related error (I/O failures while writing candidate files)
 */
export class ExportError extends IntakeError {
  constructor(message: string, cause?: Error) {
    super(message, 'export', { recoverable: true, cause });
    this.name = 'ExportError';
  }
}

/**
 * Invalid config.yaml or command-line options
 */
export class ConfigError extends IntakeError {
  constructor(message: string, cause?: Error) {
    super(message, 'validation', { recoverable: false, cause });
    this.name = 'ConfigError';
  }
}

/**
 * User cancelled the intake
 */
export class UserCancelledError extends IntakeError {
  constructor(message: string = 'Intake cancelled by user') {
    super(message, 'user_cancelled', { recoverable: true });
    this.name = 'UserCancelledError';
  }
}

/**
 * Result of a session save attempt
 */
export interface SessionSaveResult {
  success: boolean;
  path?: string;
  error?: Error;
}

/**
 * Classify an error into an appropriate IntakeError
 */
export function classifyError(error: unknown): IntakeError {
  if (error instanceof IntakeError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new IntakeError(String(error), 'unknown', { recoverable: true });
  }

  const message = error.message.toLowerCase();

  if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
    const timeoutMatch = message.match(/(\d+)\s*ms/);
    const timeoutMs = timeoutMatch ? parseInt(timeoutMatch[1], 10) : 0;
    return new TimeoutError(error.message, timeoutMs);
  }

  if (
    message.includes('enotfound') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('etimedout') ||
    message.includes('network') ||
    message.includes('dns')
  ) {
    return new NetworkError(error.message, error);
  }

  if (
    message.includes('sigterm') ||
    message.includes('sigkill') ||
    message.includes('spawn') ||
    message.includes('exit code') ||
    message.includes('exited')
  ) {
    const exitCodeMatch = message.match(/exit code (\d+)/);
    const exitCode = exitCodeMatch ? parseInt(exitCodeMatch[1], 10) : undefined;
    return new ProcessError(error.message, { exitCode, cause: error });
  }

  if (
    message.includes('session') ||
    message.includes('eacces') ||
    message.includes('enoent') ||
    message.includes('corrupted')
  ) {
    return new StateError(error.message, error);
  }

  if (
    message.includes('api') ||
    message.includes('rate limit') ||
    message.includes('quota') ||
    message.includes('authentication') ||
    message.includes('unauthorized') ||
    message.includes('provider')
  ) {
    return new ProviderError(error.message, error);
  }

  return new IntakeError(error.message, 'unknown', {
    recoverable: true,
    cause: error,
  });
}

/**
 * Attempt to save the session (won't throw)
 */
export async function trySaveSession(
  state: SessionState,
  baseDir?: string
): Promise<SessionSaveResult> {
  try {
    const path = await saveSession(state, baseDir);
    return { success: true, path };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * Options for retrying with exponential backoff
 */
export interface RetryOptions {
  /** Maximum number of attempts */
  maxAttempts?: number;
  /** Initial delay between retries in ms */
  initialDelayMs?: number;
  /** Maximum delay between retries in ms */
  maxDelayMs?: number;
  /** Factor to multiply delay by after each attempt */
  backoffFactor?: number;
  /** Error categories that should be retried */
  retryableCategories?: ErrorCategory[];
  /** Abort waiting between attempts */
  signal?: AbortSignal;
  /** Callback when a retry is attempted */
  onRetry?: (attempt: number, error: IntakeError, delayMs: number) => void;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Retry an operation with exponential backoff
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffFactor = 2,
    retryableCategories = ['network', 'provider', 'process'],
    signal,
    onRetry,
  } = options;

  let lastError: IntakeError | undefined;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = classifyError(error);

      const shouldRetry =
        attempt < maxAttempts &&
        !signal?.aborted &&
        lastError.recoverable &&
        retryableCategories.includes(lastError.category);

      if (!shouldRetry) {
        throw lastError;
      }

      onRetry?.(attempt, lastError, delay);

      await sleep(delay, signal);
      if (signal?.aborted) {
        throw lastError;
      }

      delay = Math.min(delay * backoffFactor, maxDelayMs);
    }
  }

  throw lastError ?? new IntakeError('Operation failed after retries', 'unknown');
}

/**
 * Run an operation with a deadline
 * The operation receives an AbortSignal that fires when the deadline passes,
 * and the returned promise rejects with a TimeoutError at that moment.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string = 'Operation'
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
