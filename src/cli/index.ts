#!/usr/bin/env node
/**
 * Candidate intake CLI entry point
 */

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { VERSION } from '../index.js';
import { isExportFormat, type AutoExport } from '../core/config.js';
import { classifyError } from '../core/error-recovery.js';
import { runInterview, type InterviewResult } from '../core/interview.js';
import { PROVIDERS, isValidProvider, type ProviderChoice } from '../providers/index.js';
import { getLogger } from '../utils/logger.js';
import {
  createTerminalIO,
  renderCompletionBanner,
  renderErrorBanner,
  renderNotice,
  renderWelcomeBanner,
} from './prompt.js';

/**
 * Options as commander hands them over
 */
export interface RawCLIOptions {
  resume?: boolean;
  provider?: string;
  export?: string;
  output?: string;
  timeout?: string;
  verbose?: boolean;
}

export interface CLIOptions {
  resume: boolean;
  verbose: boolean;
  provider?: ProviderChoice;
  exportFormat?: AutoExport;
  outputDir?: string;
  timeoutMs?: number;
}

export interface CLIResult {
  action: 'start' | 'resume' | 'error';
  options: CLIOptions;
  errors: string[];
}

/**
 * Example usage strings for help output
 */
export const EXAMPLES = `
Examples:
  $ intake
      Start a new candidate intake

  $ intake --resume
      Continue an intake that was interrupted or exited early

  $ intake --provider static
      Use the built-in question bank instead of an AI provider

  $ intake --export markdown --output ./candidates
      Write a markdown report to ./candidates when the application is complete

  $ intake --timeout 5000 --verbose
      Give question generation 5 seconds and show log output
`;

/**
 * Detailed description for the CLI
 */
export const DESCRIPTION = `Conversational candidate intake

Walks a job candidate through a short screening conversation: contact details,
experience, desired position, location and tech stack, followed by 3-5
technical questions generated for that stack.

Files are kept under ./intake/:
  - config.yaml   - Settings (created on first run)
  - session.yaml  - Progress of an unfinished intake
  - logs/         - Log output`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('intake')
    .description(DESCRIPTION)
    .version(VERSION, '-v, --version', 'Display the current version')
    .option('-r, --resume', 'Resume a previously interrupted intake from ./intake/session.yaml')
    .option('-p, --provider <name>', `Question provider: ${PROVIDERS.join(', ')} (default: from config)`)
    .option('-e, --export <format>', 'Export format written on completion: json, csv, markdown or none')
    .option('-o, --output <dir>', 'Directory exported files are written to')
    .option('-t, --timeout <ms>', 'Deadline for generating technical questions, in milliseconds')
    .option('--verbose', 'Show log output in the terminal')
    .addHelpText('after', EXAMPLES)
    .showHelpAfterError('(use --help for available options)');

  return program;
}

/**
 * Check and convert raw option values
 */
export function resolveOptions(raw: RawCLIOptions): { options: CLIOptions; errors: string[] } {
  const errors: string[] = [];
  const options: CLIOptions = {
    resume: raw.resume ?? false,
    verbose: raw.verbose ?? false,
  };

  if (raw.provider !== undefined) {
    if (isValidProvider(raw.provider)) {
      options.provider = raw.provider;
    } else {
      errors.push(`Unknown provider "${raw.provider}". Choose one of: ${PROVIDERS.join(', ')}`);
    }
  }

  if (raw.export !== undefined) {
    const format = raw.export.toLowerCase();
    if (format === 'none' || isExportFormat(format)) {
      options.exportFormat = format;
    } else {
      errors.push(`Unknown export format "${raw.export}". Choose one of: json, csv, markdown, none`);
    }
  }

  if (raw.output !== undefined) {
    options.outputDir = raw.output;
  }

  if (raw.timeout !== undefined) {
    const timeoutMs = /^\d+$/.test(raw.timeout) ? Number(raw.timeout) : NaN;
    if (timeoutMs > 0) {
      options.timeoutMs = timeoutMs;
    } else {
      errors.push(`Timeout must be a positive number of milliseconds, got "${raw.timeout}"`);
    }
  }

  return { options, errors };
}

export function runCLI(argv: string[] = process.argv): CLIResult {
  const program = createProgram();

  let result: CLIResult = {
    action: 'error',
    options: { resume: false, verbose: false },
    errors: [],
  };

  program.action((raw: RawCLIOptions) => {
    const { options, errors } = resolveOptions(raw);

    if (errors.length > 0) {
      for (const error of errors) {
        console.error(`Error: ${error}`);
      }
      result = { action: 'error', options, errors };
      return;
    }

    result = { action: options.resume ? 'resume' : 'start', options, errors };
  });

  program.parse(argv);
  return result;
}

/**
 * Get the full help text output
 */
export function getHelpText(): string {
  const program = createProgram();
  return program.helpInformation();
}

function reportOutcome(result: InterviewResult): void {
  switch (result.status) {
    case 'completed':
      renderCompletionBanner(result.exports);
      break;
    case 'exited':
    case 'cancelled':
      renderNotice('info', 'Your progress has been saved. Run "intake --resume" to continue.');
      break;
  }
}

/**
 * Parse arguments, run the intake and return the process exit code
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const cli = runCLI(argv);
  if (cli.action === 'error') {
    return 1;
  }

  renderWelcomeBanner();

  try {
    const result = await runInterview({
      io: createTerminalIO(),
      resume: cli.options.resume,
      provider: cli.options.provider,
      exportFormat: cli.options.exportFormat,
      outputDir: cli.options.outputDir,
      timeoutMs: cli.options.timeoutMs,
      verbose: cli.options.verbose,
    });
    reportOutcome(result);
    return 0;
  } catch (error) {
    const classified = classifyError(error);
    getLogger().error(`Intake failed (${classified.category}): ${classified.message}`);
    renderErrorBanner(classified);
    return 1;
  }
}

// Only run if this is the main module
// Use realpathSync to handle symlinks (e.g., when installed globally via npm)
function isMain(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const executedFile = realpathSync(process.argv[1]);
    return currentFile === executedFile;
  } catch {
    return false;
  }
}

if (isMain()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
