/**
 * Terminal rendering for the intake
 * Stage headers, assistant messages, notices and the spinner, plus the
 * InterviewIO implementation backed by Inquirer.js
 */

import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import { UserCancelledError, type IntakeError } from '../core/error-recovery.js';
import type { InterviewIO, NoticeKind } from '../core/interview.js';
import { STAGE_HINTS, STAGE_LABELS, stageProgress, type Stage } from '../core/stages.js';

/**
 * "Step N of 8: Label" for the stage awaiting an answer
 */
export function formatStageProgress(stage: Stage): string {
  const { step, total } = stageProgress(stage);
  return `Step ${step} of ${total}: ${STAGE_LABELS[stage]}`;
}

/**
 * Input tip for a stage; the terminal stage points at the slash commands instead
 */
export function stageHint(stage: Stage): string {
  if (stage === 'conclusion') {
    return 'Type /export <format> to save your application, or "bye" to leave';
  }
  return STAGE_HINTS[stage];
}

/**
 * Render the progress chip and hint shown before each prompt
 */
export function renderStageHeader(stage: Stage): void {
  console.log();
  console.log(chalk.bgMagenta.white.bold(` ${formatStageProgress(stage)} `));
  console.log(chalk.dim(`💡 ${stageHint(stage)}`));
}

/**
 * Display a visual separator line
 */
export function renderSeparator(style: 'light' | 'heavy' | 'double' = 'light', width: number = 60): void {
  const chars: Record<typeof style, string> = {
    light: '─',
    heavy: '━',
    double: '═',
  };
  console.log(chalk.dim(chars[style].repeat(width)));
}

/**
 * Render an assistant message between rules
 */
export function renderAssistantMessage(text: string): void {
  if (!text.trim()) return;

  console.log();
  console.log(chalk.cyan('─'.repeat(60)));
  for (const line of text.split('\n')) {
    console.log(chalk.white(line));
  }
  console.log(chalk.cyan('─'.repeat(60)));
}

const NOTICE_STYLES: Record<NoticeKind, { icon: string; color: (s: string) => string }> = {
  info: { icon: 'ℹ', color: (s) => chalk.cyan(s) },
  success: { icon: '✔', color: (s) => chalk.green(s) },
  warning: { icon: '⚠', color: (s) => chalk.yellow(s) },
  error: { icon: '✖', color: (s) => chalk.red(s) },
};

export function formatNotice(kind: NoticeKind, message: string): string {
  const style = NOTICE_STYLES[kind];
  return style.color(`${style.icon} ${message}`);
}

export function renderNotice(kind: NoticeKind, message: string): void {
  console.log(formatNotice(kind, message));
}

/**
 * Spinner frames for animation
 */
export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

/**
 * Default spinner interval in milliseconds
 */
export const SPINNER_INTERVAL_MS = 80;

export interface Spinner {
  start: () => void;
  /** Stop the spinner and clear the line */
  stop: () => void;
  /** Stop the spinner and leave a failure mark on the line */
  fail: (text?: string) => void;
}

/**
 * Create a simple spinner for async operations
 */
export function createSpinner(message: string = 'Thinking...'): Spinner {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let frameIndex = 0;

  const clearLine = (): void => {
    process.stdout.write('\r' + ' '.repeat(message.length + 3) + '\r');
  };
  const halt = (): void => {
    if (intervalId) {
      clearInterval(intervalId);
      intervalId = null;
    }
  };

  return {
    start: () => {
      if (intervalId) return;
      process.stdout.write(`\r${chalk.cyan(SPINNER_FRAMES[0])} ${message}`);
      intervalId = setInterval(() => {
        frameIndex = (frameIndex + 1) % SPINNER_FRAMES.length;
        process.stdout.write(`\r${chalk.cyan(SPINNER_FRAMES[frameIndex])} ${message}`);
      }, SPINNER_INTERVAL_MS);
    },
    stop: () => {
      if (intervalId) {
        halt();
        clearLine();
      }
    },
    fail: (text?: string) => {
      halt();
      console.log(`\r${chalk.red('✖')} ${text || message}`);
    },
  };
}

/**
 * Display welcome banner at start of the intake
 */
export function renderWelcomeBanner(): void {
  console.log();
  renderSeparator('double');
  console.log(chalk.bold.cyan('  🧑‍💼 Candidate Intake'));
  renderSeparator('double');
  console.log();
  console.log(chalk.dim('  Commands: ') + chalk.white('/help, /reset, /export <format>'));
}

/**
 * Display completion banner listing the files written
 */
export function renderCompletionBanner(exports: readonly string[]): void {
  console.log();
  renderSeparator('double');
  console.log(chalk.bold.green('  ✨ Application Complete!'));
  renderSeparator('double');
  for (const path of exports) {
    console.log(chalk.dim('  Export: ') + chalk.cyan(path));
  }
  console.log();
}

/**
 * Display error banner
 */
export function renderErrorBanner(error: IntakeError): void {
  console.log();
  renderSeparator('heavy');
  console.log(chalk.bold.red('  ❌ Error'));
  renderSeparator('heavy');
  console.log();
  console.log(chalk.red('  ' + error.message));
  console.log();
  console.log(chalk.yellow('  ' + error.getRecoveryInstructions()));
  console.log();
}

/**
 * Inquirer rejects with ExitPromptError when the user presses Ctrl+C
 */
export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

/**
 * Show the stage header and read one answer
 */
export async function promptAnswer(stage: Stage): Promise<string> {
  renderStageHeader(stage);
  try {
    return await input({ message: 'You:' });
  } catch (error) {
    if (isPromptExit(error)) {
      throw new UserCancelledError();
    }
    throw error;
  }
}

/**
 * InterviewIO for an interactive terminal
 */
export function createTerminalIO(): InterviewIO {
  return {
    say: renderAssistantMessage,
    notify: renderNotice,
    ask: promptAnswer,
    busy: async (message, task) => {
      const spinner = createSpinner(message);
      spinner.start();
      try {
        const result = await task();
        spinner.stop();
        return result;
      } catch (error) {
        spinner.fail();
        throw error;
      }
    },
  };
}
