/**
 * QuestionSource: where a session's questions come from.
 *
 * `OpenTdbQuestionSource` talks to the Open Trivia Database:
 * builds the query from a GameConfiguration, validates the response,
 * and normalizes every raw question (sanitized text, shuffled answers).
 */

import { randomUUID } from "node:crypto";
import nodeFetch, { type Response } from "node-fetch";
import { z } from "zod";
import type { GameConfiguration, Question } from "./types.js";
import { sanitize } from "./textSanitizer.js";
import { shuffleAnswers, type RandomSource } from "./answerShuffler.js";

export interface QuestionSource {
  /** Resolve with questions in presentation order, or reject with FetchError */
  fetch(config: GameConfiguration): Promise<Question[]>;
}

// ═══════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════

export type FetchErrorKind =
  | "network-unreachable"
  | "http-status"
  | "invalid-response"
  | "invalid-request"
  | "no-results"
  | "rate-limited";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | null;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options: { cause?: unknown; status?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

// ═══════════════════════════════════════════════════════════
// Open Trivia DB
// ═══════════════════════════════════════════════════════════

export const DEFAULT_API_URL = "https://opentdb.com/api.php";

const rawQuestionSchema = z.object({
  question: z.string(),
  correct_answer: z.string(),
  incorrect_answers: z.array(z.string()),
  category: z.string().optional(),
  difficulty: z.string().optional(),
  type: z.string().optional(),
});

const questionResponseSchema = z.object({
  response_code: z.number().int().optional(),
  results: z.array(rawQuestionSchema),
});

export type RawQuestion = z.infer<typeof rawQuestionSchema>;

/** response_code values the API documents besides 0 (success) */
const RESPONSE_CODE_ERRORS: Record<
  number,
  { kind: FetchErrorKind; message: string }
> = {
  1: { kind: "no-results", message: "Not enough questions for this query" },
  2: { kind: "invalid-request", message: "Invalid query parameter" },
  3: { kind: "invalid-request", message: "Session token not found" },
  4: { kind: "invalid-request", message: "Session token exhausted" },
  5: { kind: "rate-limited", message: "Too many requests" },
};

export interface OpenTdbQuestionSourceOptions {
  baseUrl?: string;
  /** Injected for tests; defaults to node-fetch */
  fetchFn?: typeof nodeFetch;
  random?: RandomSource;
  createId?: () => string;
}

export class OpenTdbQuestionSource implements QuestionSource {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof nodeFetch;
  private readonly random: RandomSource;
  private readonly createId: () => string;

  constructor(options: OpenTdbQuestionSourceOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_API_URL;
    this.fetchFn = options.fetchFn ?? nodeFetch;
    this.random = options.random ?? Math.random;
    this.createId = options.createId ?? randomUUID;
  }

  /** Build the request URL; "any" selectors are left out */
  buildUrl(config: GameConfiguration): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("amount", String(config.questionCount));
    if (config.category !== "any") {
      url.searchParams.set("category", String(config.category));
    }
    if (config.difficulty !== "any") {
      url.searchParams.set("difficulty", config.difficulty);
    }
    url.searchParams.set("type", config.type);
    return url.toString();
  }

  async fetch(config: GameConfiguration): Promise<Question[]> {
    const url = this.buildUrl(config);

    let res: Response;
    try {
      res = await this.fetchFn(url);
    } catch (err) {
      throw new FetchError("network-unreachable", "Trivia API unreachable", {
        cause: err,
      });
    }

    if (res.status === 429) {
      throw new FetchError("rate-limited", "Too many requests", {
        status: res.status,
      });
    }
    if (!res.ok) {
      throw new FetchError("http-status", `Trivia API error: ${res.status}`, {
        status: res.status,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new FetchError("invalid-response", "Response is not JSON", {
        cause: err,
      });
    }

    const parsed = questionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError("invalid-response", "Unexpected response shape", {
        cause: parsed.error,
      });
    }

    const code = parsed.data.response_code ?? 0;
    const codeError = RESPONSE_CODE_ERRORS[code];
    if (codeError) {
      throw new FetchError(codeError.kind, codeError.message);
    }
    if (code !== 0) {
      throw new FetchError(
        "invalid-response",
        `Unknown response_code: ${code}`,
      );
    }

    const { results } = parsed.data;
    if (results.length === 0) {
      throw new FetchError("no-results", "No questions returned");
    }
    if (results.length < config.questionCount) {
      console.warn(
        `[QuestionSource] Requested ${config.questionCount} questions, received ${results.length}`,
      );
    }

    return results.map((raw) => this.toQuestion(raw));
  }

  /** Normalize one raw API question */
  toQuestion(raw: RawQuestion): Question {
    const correctAnswer = sanitize(raw.correct_answer);
    // An incorrect answer that decodes to the correct one would show it twice
    const incorrect = raw.incorrect_answers.filter(
      (answer) => sanitize(answer) !== correctAnswer,
    );

    return {
      id: this.createId(),
      text: sanitize(raw.question),
      answers: shuffleAnswers(raw.correct_answer, incorrect, this.random).map(
        sanitize,
      ),
      correctAnswer,
      category: raw.category !== undefined ? sanitize(raw.category) : null,
      difficulty: raw.difficulty ?? null,
    };
  }
}
