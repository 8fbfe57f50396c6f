/**
 * trivia-quiz core: Type System
 *
 * Shared types for the question source, the game session state machine
 * and the presentation layer that renders it.
 */

import type { FetchError } from "./questionSource.js";

// ═══════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════

export type Difficulty = "any" | "easy" | "medium" | "hard";
export type QuestionType = "multiple" | "boolean";
/** Open Trivia DB category id, or "any" to leave the filter out */
export type CategorySelector = number | "any";

/** What the player asked for; immutable once a session starts */
export interface GameConfiguration {
  /** Number of questions to request (1–50) */
  questionCount: number;
  category: CategorySelector;
  difficulty: Difficulty;
  type: QuestionType;
  /** Seconds allowed per question */
  timerSeconds: number;
}

export interface ApiConfig {
  /** Question endpoint, e.g. https://opentdb.com/api.php */
  baseUrl: string;
}

export interface TimingConfig {
  /** Interval between countdown ticks (one tick = one second of game time) */
  tickIntervalMs: number;
  /** How long the correctness feedback stays up before advancing */
  reviewDelayMs: number;
}

export interface AppConfig {
  api: ApiConfig;
  game: GameConfiguration;
  timing: TimingConfig;
}

// ═══════════════════════════════════════════════════════════
// Questions
// ═══════════════════════════════════════════════════════════

export interface Question {
  readonly id: string;
  readonly text: string;
  /** Display order, shuffled once at creation */
  readonly answers: readonly string[];
  readonly correctAnswer: string;
  readonly category: string | null;
  readonly difficulty: string | null;
}

// ═══════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════

export type SessionPhase = "loading" | "active" | "reviewing" | "game-over";

export type SubmitTrigger = "manual" | "timeout";

export interface AnswerRecord {
  questionIndex: number;
  questionId: string;
  selectedAnswer: string | null;
  correctAnswer: string;
  correct: boolean;
  timedOut: boolean;
}

export interface SubmissionOutcome {
  questionIndex: number;
  correct: boolean;
  /** Score after this submission */
  score: number;
  trigger: SubmitTrigger;
}

/** Question as the presentation layer sees it (no correct answer) */
export interface PublicQuestion {
  id: string;
  text: string;
  answers: readonly string[];
  category: string | null;
  difficulty: string | null;
}

export interface GameSnapshot {
  phase: SessionPhase;
  generation: number;
  currentIndex: number;
  totalQuestions: number;
  question: PublicQuestion | null;
  selectedAnswer: string | null;
  lastAnswerCorrect: boolean | null;
  remainingSeconds: number;
  score: number;
}

export interface ResultsSummary {
  score: number;
  total: number;
}

// ═══════════════════════════════════════════════════════════
// Events
// ═══════════════════════════════════════════════════════════

export interface LoadedPayload {
  generation: number;
  requested: number;
  received: number;
}

/** Event map for the session EventBus: event name → handler arguments */
export interface SessionEvents {
  "session:loading": [{ generation: number }];
  "session:loaded": [LoadedPayload];
  "session:fetch-failed": [FetchError];
  "session:question": [GameSnapshot];
  "session:tick": [{ remainingSeconds: number }];
  "session:answer-selected": [{ answer: string }];
  "session:submitted": [SubmissionOutcome];
  "session:finished": [ResultsSummary];
  "session:restarted": [{ generation: number }];
  "session:updated": [GameSnapshot];
}
