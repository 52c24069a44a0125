/**
 * Logging for the intake CLI
 * Based on tslog; console output can be hidden so logs never interleave with the conversation
 */

import { Logger, type ILogObj } from 'tslog';
import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = [
  'silly',
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

export interface LoggerConfig {
  name: string;
  level: LogLevel;
  /** Print to the console; when false only transports receive log records */
  console: boolean;
  prettyPrint: boolean;
  logToFile: boolean;
  logDir?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: 'intake',
  level: 'warn',
  console: true,
  prettyPrint: true,
  logToFile: false,
};

/**
 * Map a log level name to tslog's numeric minLevel
 */
export function levelToNumber(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    name: finalConfig.name,
    type: finalConfig.console ? 'pretty' : 'hidden',
    minLevel: levelToNumber(finalConfig.level),
    prettyLogTemplate: finalConfig.prettyPrint
      ? '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] '
      : undefined,
    prettyLogTimeZone: 'local',
    stylePrettyLogs: finalConfig.prettyPrint,
  });

  if (finalConfig.logToFile && finalConfig.logDir) {
    setupFileLogging(logger, finalConfig.logDir, finalConfig.name);
  }

  return logger;
}

/**
 * Append every log record to <logDir>/<name>.log as one JSON line
 */
function setupFileLogging(logger: Logger<ILogObj>, logDir: string, name: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFile = path.join(logDir, `${name}.log`);

  logger.attachTransport((logObj) => {
    fs.appendFileSync(logFile, JSON.stringify(logObj) + '\n');
  });
}

export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

let globalLogger: Logger<ILogObj> | null = null;

export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}

/**
 * Initialize logging for an intake run: JSON lines under <baseDir>/intake/logs,
 * console output only when verbose
 */
export function initializeLogging(
  baseDir: string,
  level: LogLevel = 'info',
  verbose: boolean = false
): Logger<ILogObj> {
  const logger = createLogger({
    name: 'intake',
    level,
    console: verbose,
    prettyPrint: process.stdout.isTTY ?? false,
    logToFile: true,
    logDir: path.join(baseDir, 'intake', 'logs'),
  });

  setLogger(logger);
  return logger;
}

/**
 * Log execution timing of an async operation
 */
export async function logTiming<T>(
  logger: Logger<ILogObj>,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = performance.now();
  try {
    const result = await fn();
    const duration = performance.now() - start;
    logger.debug({ operation, durationMs: duration.toFixed(2), status: 'success' });
    return result;
  } catch (error) {
    const duration = performance.now() - start;
    logger.error({ operation, durationMs: duration.toFixed(2), status: 'error', error });
    throw error;
  }
}
