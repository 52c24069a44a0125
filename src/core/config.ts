/**
 * Configuration management for the intake CLI
 * Handles loading, saving, and validating configuration from ./intake/config.yaml
 */

import { readFile, writeFile, mkdir, access } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import { PROVIDERS, type ProviderChoice } from '../providers/index.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import { ConfigError } from './error-recovery.js';

export const EXPORT_FORMATS = ['json', 'csv', 'markdown'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type AutoExport = ExportFormat | 'none';

export interface IntakeConfig {
  /** Backend that writes technical questions; "static" uses the built-in table only */
  questionProvider: ProviderChoice;
  /** OpenAI model; the claude provider uses the CLI's own default */
  model: string;
  /** Deadline for one question generation call, in milliseconds */
  timeoutMs: number;
  /** Provider attempts before falling back to built-in questions */
  maxAttempts: number;
  /** How long generated questions are reused for the same tech stack; 0 disables caching */
  cacheTtlSeconds: number;
  /** Where exported candidate files are written (relative to the working directory) */
  outputDirectory: string;
  /** Format written automatically when an application completes */
  autoExport: AutoExport;
  /** Minimum level written to intake/logs/intake.log */
  logLevel: LogLevel;
}

export interface ConfigResult {
  config: IntakeConfig;
  /** Whether the config file was auto-created */
  wasCreated: boolean;
  /** Path to the config file */
  configPath: string;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

const DEFAULT_CONFIG: IntakeConfig = {
  questionProvider: 'openai',
  model: 'gpt-4o-mini',
  timeoutMs: 20000,
  maxAttempts: 2,
  cacheTtlSeconds: 300,
  outputDirectory: './intake',
  autoExport: 'none',
  logLevel: 'warn',
};

const AUTO_EXPORT_OPTIONS: readonly string[] = ['none', ...EXPORT_FORMATS];

const CONFIG_HEADER = `# Candidate Intake Configuration

# questionProvider: openai, claude or static
#   openai reads OPENAI_API_KEY (and optionally OPENAI_BASE_URL) from the environment
#   claude runs the Claude Code CLI in print mode with its default model
#   static only uses the built-in question table
# model: OpenAI model name, ignored by claude and static
# autoExport: none, json, csv or markdown
# logLevel: silly, trace, debug, info, warn, error or fatal
`;

/**
 * Get the path to the config file
 */
export function getConfigPath(baseDir: string = process.cwd()): string {
  return join(baseDir, 'intake', 'config.yaml');
}

/**
 * Check if a file exists
 */
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function validateOneOf(
  cfg: Record<string, unknown>,
  field: keyof IntakeConfig,
  options: readonly string[],
  errors: ConfigValidationError[]
): void {
  const value = cfg[field];
  if (value === undefined) {
    errors.push({ field, message: `${field} is required` });
  } else if (typeof value !== 'string') {
    errors.push({ field, message: `${field} must be a string` });
  } else if (!options.includes(value)) {
    errors.push({ field, message: `${field} must be one of: ${options.join(', ')}` });
  }
}

function validateInteger(
  cfg: Record<string, unknown>,
  field: keyof IntakeConfig,
  min: number,
  errors: ConfigValidationError[]
): void {
  const value = cfg[field];
  if (value === undefined) {
    errors.push({ field, message: `${field} is required` });
  } else if (typeof value !== 'number' || !Number.isInteger(value)) {
    errors.push({ field, message: `${field} must be an integer` });
  } else if (value < min) {
    errors.push({ field, message: `${field} must be at least ${min}` });
  }
}

function validateText(
  cfg: Record<string, unknown>,
  field: keyof IntakeConfig,
  errors: ConfigValidationError[]
): void {
  const value = cfg[field];
  if (value === undefined) {
    errors.push({ field, message: `${field} is required` });
  } else if (typeof value !== 'string') {
    errors.push({ field, message: `${field} must be a string` });
  } else if (value.length === 0) {
    errors.push({ field, message: `${field} cannot be empty` });
  }
}

/**
 * Validate the configuration object
 * Returns an array of validation errors (empty if valid)
 */
export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (config === null || typeof config !== 'object' || Array.isArray(config)) {
    errors.push({ field: 'root', message: 'Config must be an object' });
    return errors;
  }

  const cfg = config as Record<string, unknown>;

  validateOneOf(cfg, 'questionProvider', PROVIDERS, errors);
  validateText(cfg, 'model', errors);
  validateInteger(cfg, 'timeoutMs', 1, errors);
  validateInteger(cfg, 'maxAttempts', 1, errors);
  validateInteger(cfg, 'cacheTtlSeconds', 0, errors);
  validateText(cfg, 'outputDirectory', errors);
  validateOneOf(cfg, 'autoExport', AUTO_EXPORT_OPTIONS, errors);
  validateOneOf(cfg, 'logLevel', LOG_LEVELS, errors);

  return errors;
}

function formatErrors(errors: ConfigValidationError[]): string {
  return errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
}

/**
 * Create the default configuration file
 */
export async function createDefaultConfig(configPath: string): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });

  const yamlContent = stringify(DEFAULT_CONFIG, {
    lineWidth: 0,
  });

  await writeFile(
    configPath,
    `${CONFIG_HEADER}# This file was auto-generated on first run\n\n${yamlContent}`,
    'utf-8'
  );
}

/**
 * Load configuration from disk
 * Creates default config if it doesn't exist; fields missing from the file take their defaults
 */
export async function loadConfig(baseDir: string = process.cwd()): Promise<ConfigResult> {
  const configPath = getConfigPath(baseDir);
  let wasCreated = false;

  if (!(await fileExists(configPath))) {
    await createDefaultConfig(configPath);
    wasCreated = true;
  }

  const content = await readFile(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(
      `Invalid configuration in ${configPath}: ${message}`,
      error instanceof Error ? error : undefined
    );
  }

  // An empty file parses to null
  const fromFile = parsed ?? {};
  if (typeof fromFile !== 'object' || Array.isArray(fromFile)) {
    throw new ConfigError(`Invalid configuration in ${configPath}:\n  - root: Config must be an object`);
  }

  const merged = { ...DEFAULT_CONFIG, ...fromFile };
  const errors = validateConfig(merged);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration in ${configPath}:\n${formatErrors(errors)}`);
  }

  return {
    config: merged as IntakeConfig,
    wasCreated,
    configPath,
  };
}

/**
 * Save configuration to disk
 */
export async function saveConfig(config: IntakeConfig, baseDir: string = process.cwd()): Promise<void> {
  const configPath = getConfigPath(baseDir);

  await mkdir(dirname(configPath), { recursive: true });

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Cannot save invalid configuration:\n${formatErrors(errors)}`);
  }

  const yamlContent = stringify(config, {
    lineWidth: 0,
  });

  await writeFile(configPath, `${CONFIG_HEADER}\n${yamlContent}`, 'utf-8');
}

/**
 * Command-line values that take precedence over the config file
 */
export interface ConfigOverrides {
  questionProvider?: ProviderChoice;
  timeoutMs?: number;
  outputDirectory?: string;
  autoExport?: AutoExport;
}

/**
 * Apply command-line overrides; undefined values leave the config untouched
 * @throws ConfigError if the result is invalid
 */
export function applyOverrides(config: IntakeConfig, overrides: ConfigOverrides): IntakeConfig {
  const result: IntakeConfig = { ...config };
  if (overrides.questionProvider !== undefined) result.questionProvider = overrides.questionProvider;
  if (overrides.timeoutMs !== undefined) result.timeoutMs = overrides.timeoutMs;
  if (overrides.outputDirectory !== undefined) result.outputDirectory = overrides.outputDirectory;
  if (overrides.autoExport !== undefined) result.autoExport = overrides.autoExport;

  const errors = validateConfig(result);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid command-line options:\n${formatErrors(errors)}`);
  }
  return result;
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): IntakeConfig {
  return { ...DEFAULT_CONFIG };
}
