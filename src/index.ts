/**
 * Candidate intake
 * Main entry point for programmatic usage
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));

function readVersion(pkg: unknown): string {
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION = readVersion(packageJson);

// Conversation driver
export {
  type TurnOutcome,
  type TurnResult,
  type DriverEvent,
  type DriverEventHandler,
  type ConversationDriverOptions,
  type StageEvaluation,
  DEFAULT_ESCALATION_THRESHOLD,
  ConversationDriver,
  evaluateStageInput,
  formatQuestionsResponse,
} from './core/driver.js';

// Stages, validators and classifiers
export {
  type Stage,
  type ActiveStage,
  STAGES,
  TOTAL_STEPS,
  STAGE_LABELS,
  STAGE_HINTS,
  isStage,
  nextStage,
  stageProgress,
} from './core/stages.js';
export {
  type ExperienceResult,
  EXIT_KEYWORDS,
  MAX_TECH_STACK,
  isExitCommand,
  validateEmail,
  validatePhone,
  validateExperience,
  parseTechStack,
  titleCase,
} from './core/validators.js';
export {
  type ContextClassifier,
  type ContextVerdict,
  type ContextRejectionReason,
  DEFAULT_CLASSIFIERS,
  createKeywordClassifier,
  offTopicClassifier,
  inappropriateClassifier,
  emailShapeClassifier,
  validateConversationContext,
} from './core/context-guard.js';
export {
  WELCOME_MESSAGE,
  FAREWELL_MESSAGE,
  CLOSING_MESSAGE,
  STAGE_PROMPTS,
  CORRECTIVE_PROMPTS,
  correctivePrompt,
} from './core/messages.js';

// Sessions
export {
  type CandidateRecord,
  type SessionState,
  type SessionResult,
  type SessionValidationError,
  createSession,
  resetSession,
  validateSession,
  loadSession,
  saveSession,
  clearSession,
  hasSession,
  getSessionPath,
} from './core/session.js';

// Question generation
export {
  type QuestionSet,
  type QuestionSource,
  type QuestionGenerator,
  type FallbackTable,
  MIN_QUESTIONS,
  MAX_QUESTIONS,
  FallbackQuestionGenerator,
  ProviderQuestionGenerator,
  CachedQuestionGenerator,
  createQuestionGenerator,
  getFallbackQuestions,
  extractQuestions,
  loadFallbackTable,
} from './core/questions.js';
export { TtlCache, type TtlCacheOptions } from './core/cache.js';

// Summary and export
export {
  formatCandidateSummary,
  generateCandidateReport,
  validateDataCompleteness,
} from './core/summary.js';
export {
  type ExportResult,
  type ExportOptions,
  type SanitizedCandidate,
  exportCandidate,
  sanitizeCandidateRecord,
  hashSensitiveData,
  formatCSV,
  formatJSON,
} from './core/exporter.js';

// Configuration
export {
  type IntakeConfig,
  type ExportFormat,
  type AutoExport,
  EXPORT_FORMATS,
  loadConfig,
  saveConfig,
  validateConfig,
  getDefaultConfig,
} from './core/config.js';

// Session loop
export {
  type InterviewIO,
  type InterviewOptions,
  type InterviewResult,
  runInterview,
  parseCommand,
} from './core/interview.js';

// Error recovery
export {
  type ErrorCategory,
  type RetryOptions,
  type SessionSaveResult,
  IntakeError,
  NetworkError,
  ProviderError,
  ProcessError,
  StateError,
  ExportError,
  ConfigError,
  TimeoutError,
  UserCancelledError,
  classifyError,
  trySaveSession,
  withRetry,
  withTimeout,
} from './core/error-recovery.js';

// Providers
export {
  type QuestionProvider,
  type ProviderConfig,
  type ProviderChoice,
  PROVIDERS,
  ProviderRegistry,
  providerRegistry,
  OpenAIProvider,
  ClaudeProvider,
} from './providers/index.js';
