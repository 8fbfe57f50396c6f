/**
 * trivia-quiz core: Public API
 *
 * Barrel export for all core modules.
 */

// Types
export type {
  AppConfig,
  ApiConfig,
  TimingConfig,
  GameConfiguration,
  Difficulty,
  QuestionType,
  CategorySelector,
  Question,
  PublicQuestion,
  SessionPhase,
  SubmitTrigger,
  SubmissionOutcome,
  AnswerRecord,
  GameSnapshot,
  ResultsSummary,
  LoadedPayload,
  SessionEvents,
} from "./types.js";

// EventBus
export { EventBus } from "./eventBus.js";
export type { EventHandler } from "./eventBus.js";

// Text & answers
export { sanitize } from "./textSanitizer.js";
export { shuffle, shuffleAnswers } from "./answerShuffler.js";
export type { RandomSource } from "./answerShuffler.js";

// Question source
export {
  OpenTdbQuestionSource,
  FetchError,
  DEFAULT_API_URL,
} from "./questionSource.js";
export type {
  QuestionSource,
  FetchErrorKind,
  RawQuestion,
  OpenTdbQuestionSourceOptions,
} from "./questionSource.js";

// Session
export { GameSession } from "./gameSession.js";
export { summarize } from "./resultsSummary.js";
export { SessionController } from "./sessionController.js";
export type {
  SessionControllerOptions,
  SessionSubscriber,
} from "./sessionController.js";

// Scheduling
export { timerScheduler } from "./scheduler.js";
export type { Scheduler, CancelHandle } from "./scheduler.js";

// Config
export {
  loadAppConfig,
  loadAppConfigWithEnv,
  parseCategory,
  gameConfigurationSchema,
  DEFAULT_APP_CONFIG,
  MAX_TIMER_DELAY_MS,
} from "./config.js";
export type { AppConfigInput } from "./config.js";
