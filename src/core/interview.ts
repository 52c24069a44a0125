/**
 * Intake session loop
 * Hosts the conversation driver: reads candidate messages, persists the session
 * after every turn and handles the in-session slash commands.
 */

import { resolve } from 'node:path';
import type { Logger, ILogObj } from 'tslog';
import {
  applyOverrides,
  isExportFormat,
  loadConfig,
  type AutoExport,
  type ExportFormat,
  type IntakeConfig,
} from './config.js';
import { ConversationDriver } from './driver.js';
import { UserCancelledError, trySaveSession } from './error-recovery.js';
import { exportCandidate } from './exporter.js';
import { CLOSING_MESSAGE, STAGE_PROMPTS, WELCOME_MESSAGE } from './messages.js';
import { createQuestionGenerator, type QuestionGenerator } from './questions.js';
import { clearSession, createSession, hasSession, loadSession, type SessionState } from './session.js';
import type { Stage } from './stages.js';
import type { ProviderChoice } from '../providers/index.js';
import { createChildLogger, initializeLogging } from '../utils/logger.js';

export type NoticeKind = 'info' | 'success' | 'warning' | 'error';

/**
 * Terminal surface the loop talks through
 */
export interface InterviewIO {
  /** Show an assistant message */
  say(message: string): void;
  /** Show a status line that is not part of the conversation */
  notify(kind: NoticeKind, message: string): void;
  /**
   * Read the candidate's next message.
   * Rejects with UserCancelledError when the candidate aborts the prompt.
   */
  ask(stage: Stage): Promise<string>;
  /** Run slow work behind a progress indicator */
  busy<T>(message: string, task: () => Promise<T>): Promise<T>;
}

export interface InterviewOptions {
  io: InterviewIO;
  /** Directory holding intake/ (config, session, logs) */
  baseDir?: string;
  /** Continue the saved session instead of starting over */
  resume?: boolean;
  provider?: ProviderChoice;
  /** Format written automatically when the application completes */
  exportFormat?: AutoExport;
  outputDir?: string;
  timeoutMs?: number;
  verbose?: boolean;
  /** Replaces the generator chosen from the configuration */
  questionGenerator?: QuestionGenerator;
  now?: () => Date;
}

export type InterviewStatus = 'completed' | 'exited' | 'cancelled';

export interface InterviewResult {
  status: InterviewStatus;
  state: SessionState;
  /** Files written by auto-export or /export */
  exports: string[];
}

export interface SlashCommand {
  name: string;
  argument?: string;
}

export const HELP_TEXT = `Available commands:
  /reset            Discard your answers and start over
  /export <format>  Save your completed application (json, csv or markdown)
  /help             Show this list
Type "exit" or "bye" at any time to leave. Your progress is saved.`;

const COMMAND_PATTERN = /^\/([a-z]+)(?:\s+(.+))?$/i;

/**
 * Parse "/name [argument]"; returns null for ordinary messages
 */
export function parseCommand(input: string): SlashCommand | null {
  const match = input.trim().match(COMMAND_PATTERN);
  if (!match) {
    return null;
  }
  const argument = match[2]?.trim();
  return argument ? { name: match[1].toLowerCase(), argument } : { name: match[1].toLowerCase() };
}

interface LoopContext {
  io: InterviewIO;
  config: IntakeConfig;
  baseDir: string;
  driver: ConversationDriver;
  logger: Logger<ILogObj>;
  now: () => Date;
  exports: string[];
}

async function persist(ctx: LoopContext, state: SessionState): Promise<void> {
  const saved = await trySaveSession(state, ctx.baseDir);
  if (!saved.success) {
    const message = saved.error?.message ?? 'unknown error';
    ctx.logger.warn(`Failed to save session: ${message}`);
    ctx.io.notify('warning', `Could not save your progress: ${message}`);
  }
}

async function runExport(ctx: LoopContext, state: SessionState, format: ExportFormat): Promise<void> {
  const result = await exportCandidate(state.record, format, {
    outputDir: resolve(ctx.baseDir, ctx.config.outputDirectory),
    now: ctx.now(),
  });

  if (result.success && result.path) {
    ctx.exports.push(result.path);
    ctx.logger.info(`Exported candidate as ${format} to ${result.path}`);
    ctx.io.notify('success', `Saved ${format} export to ${result.path}`);
  } else {
    const message = result.error?.message ?? `Export as ${format} failed`;
    ctx.logger.warn(message);
    ctx.io.notify('error', message);
  }
}

async function handleCommand(ctx: LoopContext, command: SlashCommand, state: SessionState): Promise<SessionState> {
  switch (command.name) {
    case 'help':
      ctx.io.say(HELP_TEXT);
      return state;

    case 'reset': {
      const fresh = ctx.driver.reset();
      await persist(ctx, fresh);
      ctx.logger.info('Session reset');
      ctx.io.say(`Let's start over. ${STAGE_PROMPTS.name}`);
      return fresh;
    }

    case 'export': {
      if (state.stage !== 'conclusion') {
        ctx.io.notify('warning', 'Exports are available once your application is complete.');
        return state;
      }
      const requested = command.argument?.toLowerCase() ?? defaultExportFormat(ctx.config.autoExport);
      if (!isExportFormat(requested)) {
        ctx.io.notify('error', `Unknown export format "${requested}". Use json, csv or markdown.`);
        return state;
      }
      await runExport(ctx, state, requested);
      return state;
    }

    default:
      ctx.io.notify('warning', `Unknown command "/${command.name}". Type /help for the list of commands.`);
      return state;
  }
}

function defaultExportFormat(autoExport: AutoExport): ExportFormat {
  return autoExport === 'none' ? 'json' : autoExport;
}

async function startingState(ctx: LoopContext, resume: boolean): Promise<SessionState> {
  if (resume) {
    const loaded = await loadSession(ctx.baseDir);
    if (loaded) {
      ctx.logger.info(`Resuming session at stage ${loaded.state.stage}`);
      ctx.io.notify('info', `Resuming your saved intake from ${loaded.sessionPath}`);
      ctx.io.say(
        loaded.state.stage === 'conclusion'
          ? CLOSING_MESSAGE
          : `Welcome back! Let's pick up where we left off. ${STAGE_PROMPTS[loaded.state.stage]}`
      );
      return loaded.state;
    }
    ctx.io.notify('info', 'No saved intake found. Starting a new one.');
  } else if (await hasSession(ctx.baseDir)) {
    ctx.io.notify('warning', 'Replacing a previously saved intake. Use --resume to continue a saved one.');
  }

  const state = createSession(ctx.now());
  ctx.io.say(WELCOME_MESSAGE);
  return state;
}

/**
 * Run the intake until the candidate exits or cancels
 */
export async function runInterview(options: InterviewOptions): Promise<InterviewResult> {
  const baseDir = options.baseDir ?? process.cwd();
  const now = options.now ?? (() => new Date());

  const { config: fileConfig } = await loadConfig(baseDir);
  const config = applyOverrides(fileConfig, {
    questionProvider: options.provider,
    timeoutMs: options.timeoutMs,
    outputDirectory: options.outputDir,
    autoExport: options.exportFormat,
  });

  const rootLogger = initializeLogging(baseDir, config.logLevel, options.verbose ?? false);
  const logger = createChildLogger(rootLogger, 'session');

  const questionGenerator =
    options.questionGenerator ??
    (await createQuestionGenerator(config, { logger: createChildLogger(rootLogger, 'questions') }));
  logger.info(`Question generator: ${questionGenerator.name}`);

  const driver = new ConversationDriver({
    questionGenerator,
    logger: createChildLogger(rootLogger, 'driver'),
    now,
  });

  driver.onEvent((event) => {
    switch (event.type) {
      case 'context_rejected':
        logger.info(`Input redirected in stage ${event.stage} (${event.reason})`);
        break;
      case 'questions_generated':
        logger.info(`Using ${event.questions.length} technical questions from ${event.source}`);
        break;
      case 'stage_change':
        logger.debug(`Stage ${event.from} -> ${event.to}`);
        break;
    }
  });

  const ctx: LoopContext = { io: options.io, config, baseDir, driver, logger, now, exports: [] };
  let state = await startingState(ctx, options.resume ?? false);
  await persist(ctx, state);

  for (;;) {
    let input: string;
    try {
      input = await ctx.io.ask(state.stage);
    } catch (error) {
      if (error instanceof UserCancelledError) {
        logger.info(`Intake cancelled at stage ${state.stage}`);
        await persist(ctx, state);
        return { status: 'cancelled', state, exports: ctx.exports };
      }
      throw error;
    }

    const command = parseCommand(input);
    if (command) {
      state = await handleCommand(ctx, command, state);
      continue;
    }

    const current = state;
    const turn =
      current.stage === 'tech_stack'
        ? await ctx.io.busy('Preparing technical questions...', () => driver.process(input, current))
        : await driver.process(input, current);

    ctx.io.say(turn.response);
    logger.debug(`Turn in stage ${current.stage}: ${turn.outcome}`);

    if (turn.outcome === 'exit') {
      if (state.stage === 'conclusion') {
        await clearSession(baseDir);
        return { status: 'completed', state, exports: ctx.exports };
      }
      await persist(ctx, state);
      return { status: 'exited', state, exports: ctx.exports };
    }

    state = turn.state;
    await persist(ctx, state);

    if (turn.outcome === 'advanced' && state.stage === 'conclusion' && config.autoExport !== 'none') {
      await runExport(ctx, state, config.autoExport);
    }
  }
}
