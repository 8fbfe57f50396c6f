/**
 * SessionController: drives a GameSession in real time.
 *
 * Owns the question fetch and the timers around the state machine.
 * Every mutation goes through the single GameSession; async results are
 * checked against the generation they were started for.
 */

import type {
  GameConfiguration,
  GameSnapshot,
  Question,
  SessionEvents,
  SubmissionOutcome,
  TimingConfig,
} from "./types.js";
import { EventBus } from "./eventBus.js";
import { GameSession } from "./gameSession.js";
import { FetchError, type QuestionSource } from "./questionSource.js";
import { summarize } from "./resultsSummary.js";
import {
  timerScheduler,
  type CancelHandle,
  type Scheduler,
} from "./scheduler.js";

export type SessionSubscriber = (snapshot: GameSnapshot) => void;

export interface SessionControllerOptions {
  config: GameConfiguration;
  source: QuestionSource;
  timing?: Partial<TimingConfig>;
  scheduler?: Scheduler;
  eventBus?: EventBus<SessionEvents>;
}

export class SessionController {
  readonly session: GameSession;
  readonly events: EventBus<SessionEvents>;
  private readonly source: QuestionSource;
  private readonly scheduler: Scheduler;
  private readonly tickIntervalMs: number;
  private readonly reviewDelayMs: number;
  private subscribers: Set<SessionSubscriber> = new Set();
  private countdown: CancelHandle | null = null;
  private pendingAdvance: CancelHandle | null = null;
  private pendingFetch: { generation: number; promise: Promise<boolean> } | null =
    null;
  private destroyed = false;

  constructor(options: SessionControllerOptions) {
    this.session = new GameSession(options.config);
    this.source = options.source;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.events = options.eventBus ?? new EventBus<SessionEvents>();
    this.tickIntervalMs = options.timing?.tickIntervalMs ?? 1000;
    this.reviewDelayMs = options.timing?.reviewDelayMs ?? 1000;
  }

  /**
   * Fetch questions for the current generation and activate the first one.
   * Resolves false when the fetch failed or was superseded, when the
   * session is not waiting for questions, or after `destroy()`.
   */
  start(): Promise<boolean> {
    if (this.destroyed) return Promise.resolve(false);
    const generation = this.session.generation;
    if (this.pendingFetch?.generation === generation) {
      return this.pendingFetch.promise;
    }
    if (this.session.phase !== "loading") return Promise.resolve(false);

    const promise = this.load(generation).finally(() => {
      if (this.pendingFetch?.generation === generation) {
        this.pendingFetch = null;
      }
    });
    this.pendingFetch = { generation, promise };
    return promise;
  }

  selectAnswer(option: string): boolean {
    if (!this.session.selectAnswer(option)) return false;
    this.events.emit("session:answer-selected", { answer: option });
    this.notify();
    return true;
  }

  /** Manual submit; no-op once the current question was submitted */
  submit(): SubmissionOutcome | null {
    const outcome = this.session.submit("manual");
    if (outcome) this.afterSubmit(outcome);
    return outcome;
  }

  /** Discard the current session and fetch a fresh set of questions */
  restart(): Promise<boolean> {
    this.stopCountdown();
    this.cancelAdvance();
    const generation = this.session.restart();
    this.events.emit("session:restarted", { generation });
    this.notify();
    return this.start();
  }

  snapshot(): GameSnapshot {
    return this.session.snapshot();
  }

  /** Subscribe to snapshots after every change */
  subscribe(subscriber: SessionSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  /** Cleanup; a fetch still in flight is discarded when it settles */
  destroy(): void {
    this.destroyed = true;
    this.pendingFetch = null;
    this.stopCountdown();
    this.cancelAdvance();
    this.subscribers.clear();
    this.events.clear();
  }

  private async load(generation: number): Promise<boolean> {
    const requested = this.session.config.questionCount;
    this.events.emit("session:loading", { generation });

    let questions: Question[];
    try {
      questions = await this.source.fetch(this.session.config);
    } catch (err) {
      if (this.isStale(generation)) return false;
      const error =
        err instanceof FetchError
          ? err
          : new FetchError("network-unreachable", "Question fetch failed", {
              cause: err,
            });
      console.error(
        `[SessionController] Fetch failed (${error.kind}):`,
        error.message,
      );
      this.events.emit("session:fetch-failed", error);
      return false;
    }

    if (this.isStale(generation)) {
      console.warn(
        `[SessionController] Discarding questions for stale generation ${generation}`,
      );
      return false;
    }

    if (!this.session.begin(questions)) {
      this.events.emit(
        "session:fetch-failed",
        new FetchError("no-results", "No questions available"),
      );
      return false;
    }

    this.events.emit("session:loaded", {
      generation,
      requested,
      received: questions.length,
    });
    this.enterQuestion();
    return true;
  }

  private isStale(generation: number): boolean {
    return this.destroyed || generation !== this.session.generation;
  }

  private enterQuestion(): void {
    const snapshot = this.session.snapshot();
    this.events.emit("session:question", snapshot);
    this.notify(snapshot);
    this.startCountdown();
  }

  private startCountdown(): void {
    this.stopCountdown();
    this.countdown = this.scheduler.every(this.tickIntervalMs, () =>
      this.handleTick(),
    );
  }

  private stopCountdown(): void {
    this.countdown?.cancel();
    this.countdown = null;
  }

  private handleTick(): void {
    if (this.session.phase !== "active") {
      this.stopCountdown();
      return;
    }
    const outcome = this.session.tick();
    this.events.emit("session:tick", {
      remainingSeconds: this.session.remainingSeconds,
    });
    if (outcome) {
      this.afterSubmit(outcome);
    } else {
      this.notify();
    }
  }

  private afterSubmit(outcome: SubmissionOutcome): void {
    this.stopCountdown();
    this.events.emit("session:submitted", outcome);
    this.notify();

    const generation = this.session.generation;
    this.cancelAdvance();
    this.pendingAdvance = this.scheduler.after(this.reviewDelayMs, () => {
      this.pendingAdvance = null;
      if (this.isStale(generation)) return;
      this.handleAdvance();
    });
  }

  private handleAdvance(): void {
    const phase = this.session.advance();
    if (phase === "active") {
      this.enterQuestion();
      return;
    }
    if (phase === "game-over") {
      const summary = summarize(this.session);
      if (summary) this.events.emit("session:finished", summary);
      this.notify();
    }
  }

  private cancelAdvance(): void {
    this.pendingAdvance?.cancel();
    this.pendingAdvance = null;
  }

  private notify(snapshot: GameSnapshot = this.session.snapshot()): void {
    this.subscribers.forEach((sub) => sub(snapshot));
    this.events.emit("session:updated", snapshot);
  }
}
