/**
 * GameSession: the per-question game loop as a synchronous state machine.
 *
 *   loading ──begin──▶ active ──submit / tick→0──▶ reviewing ──advance──▶ active …
 *                                                         └──advance (last)──▶ game-over
 *   restart: any phase ──▶ loading (next generation)
 *
 * Timers and fetching live in SessionController; this class only owns
 * state and the rules for changing it. Calls that are not valid in the
 * current phase are ignored rather than thrown.
 */

import type {
  AnswerRecord,
  GameConfiguration,
  GameSnapshot,
  Question,
  SessionPhase,
  SubmissionOutcome,
  SubmitTrigger,
} from "./types.js";

export class GameSession {
  private _phase: SessionPhase = "loading";
  private _questions: readonly Question[] = [];
  private _currentIndex = 0;
  private _selectedAnswer: string | null = null;
  private _lastAnswerCorrect: boolean | null = null;
  private _remainingSeconds: number;
  private _score = 0;
  private _generation = 0;
  private _history: AnswerRecord[] = [];

  constructor(readonly config: GameConfiguration) {
    this._remainingSeconds = config.timerSeconds;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  get questions(): readonly Question[] {
    return this._questions;
  }

  get currentIndex(): number {
    return this._currentIndex;
  }

  get currentQuestion(): Question | null {
    if (this._phase !== "active" && this._phase !== "reviewing") return null;
    return this._questions[this._currentIndex] ?? null;
  }

  get selectedAnswer(): string | null {
    return this._selectedAnswer;
  }

  get lastAnswerCorrect(): boolean | null {
    return this._lastAnswerCorrect;
  }

  get remainingSeconds(): number {
    return this._remainingSeconds;
  }

  get score(): number {
    return this._score;
  }

  /** Fetch/restart epoch; results for an older generation are stale */
  get generation(): number {
    return this._generation;
  }

  get history(): readonly AnswerRecord[] {
    return this._history;
  }

  get isOver(): boolean {
    return this._phase === "game-over";
  }

  /** Load fetched questions and activate the first one */
  begin(questions: readonly Question[]): boolean {
    if (this._phase !== "loading" || questions.length === 0) return false;
    this._questions = [...questions];
    this._currentIndex = 0;
    this.resetQuestionState();
    this._phase = "active";
    return true;
  }

  /** Choose an answer for the active question; locked once submitted */
  selectAnswer(option: string): boolean {
    const question = this.currentQuestion;
    if (this._phase !== "active" || !question) return false;
    if (this._lastAnswerCorrect !== null) return false;
    if (!question.answers.includes(option)) return false;
    this._selectedAnswer = option;
    return true;
  }

  /**
   * Score the current selection (none counts as incorrect) and move to
   * review. Returns null when there is nothing to submit, which also
   * makes a second submit for the same question a no-op.
   */
  submit(trigger: SubmitTrigger = "manual"): SubmissionOutcome | null {
    const question = this.currentQuestion;
    if (this._phase !== "active" || !question) return null;
    if (this._lastAnswerCorrect !== null) return null;

    const correct =
      this._selectedAnswer !== null &&
      this._selectedAnswer === question.correctAnswer;
    if (correct) this._score++;
    this._lastAnswerCorrect = correct;

    this._history.push({
      questionIndex: this._currentIndex,
      questionId: question.id,
      selectedAnswer: this._selectedAnswer,
      correctAnswer: question.correctAnswer,
      correct,
      timedOut: trigger === "timeout",
    });
    this._phase = "reviewing";

    return {
      questionIndex: this._currentIndex,
      correct,
      score: this._score,
      trigger,
    };
  }

  /** Leave review: next question, or game over after the last one */
  advance(): SessionPhase {
    if (this._phase !== "reviewing") return this._phase;

    if (this._currentIndex >= this._questions.length - 1) {
      this._currentIndex = this._questions.length;
      this._phase = "game-over";
      return this._phase;
    }

    this._currentIndex++;
    this.resetQuestionState();
    this._phase = "active";
    return this._phase;
  }

  /** One second of countdown; auto-submits when it reaches zero */
  tick(): SubmissionOutcome | null {
    if (this._phase !== "active") return null;
    if (this._remainingSeconds > 0) this._remainingSeconds--;
    if (this._remainingSeconds > 0) return null;
    return this.submit("timeout");
  }

  /** Discard everything; the caller must fetch again for the new generation */
  restart(): number {
    this._phase = "loading";
    this._questions = [];
    this._currentIndex = 0;
    this._score = 0;
    this._history = [];
    this.resetQuestionState();
    this._generation++;
    return this._generation;
  }

  snapshot(): GameSnapshot {
    const question = this.currentQuestion;
    return {
      phase: this._phase,
      generation: this._generation,
      currentIndex: this._currentIndex,
      totalQuestions: this._questions.length,
      question: question
        ? {
            id: question.id,
            text: question.text,
            answers: question.answers,
            category: question.category,
            difficulty: question.difficulty,
          }
        : null,
      selectedAnswer: this._selectedAnswer,
      lastAnswerCorrect: this._lastAnswerCorrect,
      remainingSeconds: this._remainingSeconds,
      score: this._score,
    };
  }

  private resetQuestionState(): void {
    this._selectedAnswer = null;
    this._lastAnswerCorrect = null;
    this._remainingSeconds = this.config.timerSeconds;
  }
}
