/**
 * Conversation driver
 * Turns one candidate message and the current session into a reply and the next session.
 * The input state is never modified, so replaying a turn gives the same result.
 */

import type { Logger, ILogObj } from 'tslog';
import {
  DEFAULT_CLASSIFIERS,
  validateConversationContext,
  type ContextClassifier,
  type ContextRejectionReason,
} from './context-guard.js';
import {
  CLOSING_MESSAGE,
  ESCALATION_NOTICE,
  FAREWELL_MESSAGE,
  STAGE_PROMPTS,
  correctivePrompt,
  unexpectedInputMessage,
} from './messages.js';
import type { QuestionGenerator, QuestionSource } from './questions.js';
import { createSession, type CandidateRecord, type SessionState } from './session.js';
import { nextStage, type ActiveStage, type Stage } from './stages.js';
import { formatCandidateSummary, numberQuestions } from './summary.js';
import {
  hasMinLength,
  isExitCommand,
  parseTechStack,
  validateEmail,
  validateExperience,
  validatePhone,
} from './validators.js';
import { createChildLogger, getLogger, logTiming } from '../utils/logger.js';

export type TurnOutcome = 'exit' | 'redirected' | 'rejected' | 'advanced' | 'concluded' | 'unexpected';

export interface TurnResult {
  /** Assistant reply to show the candidate */
  response: string;
  /** Session after this turn */
  state: SessionState;
  outcome: TurnOutcome;
}

/**
 * Event types emitted by the driver
 */
export type DriverEvent =
  | { type: 'exit'; stage: Stage }
  | { type: 'context_rejected'; stage: Stage; reason: ContextRejectionReason; errorCount: number }
  | { type: 'validation_failed'; stage: ActiveStage; errorCount: number }
  | { type: 'stage_change'; from: Stage; to: Stage }
  | { type: 'questions_requested'; techStack: string[] }
  | { type: 'questions_generated'; questions: string[]; source: QuestionSource }
  | { type: 'error'; error: Error };

export type DriverEventHandler = (event: DriverEvent) => void;

export interface ConversationDriverOptions {
  questionGenerator: QuestionGenerator;
  /** Context checks run before stage validation; first rejection wins */
  classifiers?: readonly ContextClassifier[];
  /** Error count at which corrective prompts turn strict and redirects escalate */
  escalationThreshold?: number;
  logger?: Logger<ILogObj>;
  now?: () => Date;
}

export type StageEvaluation = { valid: true; update: CandidateRecord } | { valid: false };

const MIN_NAME_LENGTH = 2;
const MIN_ANSWER_LENGTH = 10;

export const DEFAULT_ESCALATION_THRESHOLD = 3;

/**
 * Apply a stage's rule to the input. Returns the record fields to store on success.
 */
export function evaluateStageInput(stage: ActiveStage, input: string): StageEvaluation {
  const text = input.trim();

  switch (stage) {
    case 'name':
      return hasMinLength(text, MIN_NAME_LENGTH) ? { valid: true, update: { name: text } } : { valid: false };
    case 'email':
      return validateEmail(text) ? { valid: true, update: { email: text } } : { valid: false };
    case 'phone':
      return validatePhone(text) ? { valid: true, update: { phone: text } } : { valid: false };
    case 'experience': {
      const result = validateExperience(text);
      return result.valid ? { valid: true, update: { experience: result.years } } : { valid: false };
    }
    case 'position':
      return hasMinLength(text, MIN_NAME_LENGTH) ? { valid: true, update: { position: text } } : { valid: false };
    case 'location':
      return hasMinLength(text, MIN_NAME_LENGTH) ? { valid: true, update: { location: text } } : { valid: false };
    case 'tech_stack': {
      const techStack = parseTechStack(text);
      return techStack.length > 0 ? { valid: true, update: { techStack } } : { valid: false };
    }
    case 'technical_questions':
      return hasMinLength(text, MIN_ANSWER_LENGTH)
        ? { valid: true, update: { technicalAnswers: text } }
        : { valid: false };
  }
}

/**
 * Reply that presents the generated questions
 */
export function formatQuestionsResponse(techStack: readonly string[], questions: readonly string[]): string {
  return [
    `Excellent! I see you're skilled in: ${techStack.join(', ')}`,
    '',
    'Here are some technical questions based on your expertise:',
    '',
    ...numberQuestions(questions),
    '',
    'Please provide your answers to these questions:',
  ].join('\n');
}

/**
 * Finite-state conversation driver for the intake
 */
export class ConversationDriver {
  private readonly questionGenerator: QuestionGenerator;
  private readonly classifiers: readonly ContextClassifier[];
  private readonly escalationThreshold: number;
  private readonly logger: Logger<ILogObj>;
  private readonly now: () => Date;
  private eventHandlers: DriverEventHandler[] = [];

  constructor(options: ConversationDriverOptions) {
    this.questionGenerator = options.questionGenerator;
    this.classifiers = options.classifiers ?? DEFAULT_CLASSIFIERS;
    this.escalationThreshold = options.escalationThreshold ?? DEFAULT_ESCALATION_THRESHOLD;
    this.logger = options.logger ?? createChildLogger(getLogger(), 'driver');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Subscribe to driver events
   * @returns Function that removes the handler
   */
  onEvent(handler: DriverEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const index = this.eventHandlers.indexOf(handler);
      if (index >= 0) {
        this.eventHandlers.splice(index, 1);
      }
    };
  }

  private emit(event: DriverEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.debug(`Event handler failed for ${event.type}`, error);
      }
    }
  }

  /**
   * A fresh session at the first stage
   */
  reset(): SessionState {
    return createSession(this.now());
  }

  /**
   * Process one candidate message. Never rejects.
   */
  async process(input: string, state: SessionState): Promise<TurnResult> {
    try {
      return await this.handleTurn(input, state);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Unexpected error in stage ${state.stage}: ${err.message}`);
      this.emit({ type: 'error', error: err });
      return {
        response: unexpectedInputMessage(input, state.stage),
        state,
        outcome: 'unexpected',
      };
    }
  }

  private async handleTurn(input: string, state: SessionState): Promise<TurnResult> {
    if (isExitCommand(input)) {
      this.emit({ type: 'exit', stage: state.stage });
      return { response: FAREWELL_MESSAGE, state, outcome: 'exit' };
    }

    const verdict = validateConversationContext(input, state.stage, this.classifiers);
    if (!verdict.allowed) {
      const errorCount = state.errorCount + 1;
      this.emit({ type: 'context_rejected', stage: state.stage, reason: verdict.reason, errorCount });
      this.logger.debug(`Context rejected in stage ${state.stage}: ${verdict.reason}`);
      const response =
        errorCount >= this.escalationThreshold ? `${ESCALATION_NOTICE}\n\n${verdict.message}` : verdict.message;
      return { response, state: { ...state, errorCount }, outcome: 'redirected' };
    }

    if (state.stage === 'conclusion') {
      return { response: CLOSING_MESSAGE, state, outcome: 'concluded' };
    }

    return this.runStage(state.stage, input, state);
  }

  private async runStage(stage: ActiveStage, input: string, state: SessionState): Promise<TurnResult> {
    const evaluation = evaluateStageInput(stage, input);

    if (!evaluation.valid) {
      const errorCount = state.errorCount + 1;
      this.emit({ type: 'validation_failed', stage, errorCount });
      return {
        response: correctivePrompt(stage, errorCount >= this.escalationThreshold),
        state: { ...state, errorCount },
        outcome: 'rejected',
      };
    }

    let record: CandidateRecord = { ...state.record, ...evaluation.update };
    const next = nextStage(stage);
    let response: string;

    switch (stage) {
      case 'name':
        response = `Nice to meet you, ${input.trim()}! ${STAGE_PROMPTS.email}`;
        break;
      case 'tech_stack': {
        const techStack = parseTechStack(input);
        this.emit({ type: 'questions_requested', techStack });
        const { questions, source } = await logTiming(this.logger, 'Question generation', () =>
          this.questionGenerator.generate(techStack)
        );
        this.emit({ type: 'questions_generated', questions, source });
        record = { ...record, technicalQuestions: questions };
        response = formatQuestionsResponse(techStack, questions);
        break;
      }
      case 'technical_questions':
        response = formatCandidateSummary(record);
        break;
      default:
        response = STAGE_PROMPTS[next];
    }

    this.emit({ type: 'stage_change', from: stage, to: next });

    return {
      response,
      state: {
        ...state,
        stage: next,
        record,
        errorCount: 0,
        conversationStarted: true,
      },
      outcome: 'advanced',
    };
  }
}
