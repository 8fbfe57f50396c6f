/**
 * Shared test data and in-process question sources.
 */

import type { GameConfiguration, Question } from "../core/src/types.js";
import type { QuestionSource } from "../core/src/questionSource.js";

export const TEST_CONFIG: GameConfiguration = {
  questionCount: 3,
  category: "any",
  difficulty: "any",
  type: "multiple",
  timerSeconds: 30,
};

export function makeQuestion(
  index: number,
  overrides: Partial<Question> = {},
): Question {
  return {
    id: `q${index}`,
    text: `Question ${index}?`,
    answers: [`wrong-${index}-a`, `right-${index}`, `wrong-${index}-b`],
    correctAnswer: `right-${index}`,
    category: "General Knowledge",
    difficulty: "easy",
    ...overrides,
  };
}

export function makeQuestions(count: number): Question[] {
  return Array.from({ length: count }, (_, i) => makeQuestion(i + 1));
}

/** Resolves every fetch with the same questions */
export class StaticQuestionSource implements QuestionSource {
  calls = 0;

  constructor(private readonly questions: Question[]) {}

  async fetch(): Promise<Question[]> {
    this.calls++;
    return this.questions;
  }
}

interface PendingFetch {
  resolve(questions: Question[]): void;
  reject(error: unknown): void;
}

/** Leaves every fetch pending until the test settles it */
export class DeferredQuestionSource implements QuestionSource {
  readonly pending: PendingFetch[] = [];

  fetch(): Promise<Question[]> {
    return new Promise<Question[]>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }
}
