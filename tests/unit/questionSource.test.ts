/**
 * Unit tests for OpenTdbQuestionSource
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type fetch from "node-fetch";
import { Response, type ResponseInit } from "node-fetch";
import {
  FetchError,
  OpenTdbQuestionSource,
} from "../../core/src/questionSource.js";
import { TEST_CONFIG } from "../fixtures.js";

function fakeFetch(body: string, init?: ResponseInit) {
  const impl: typeof fetch = async () => new Response(body, init);
  return vi.fn(impl);
}

function jsonFetch(body: unknown, init?: ResponseInit) {
  return fakeFetch(JSON.stringify(body), init);
}

function createSource(fetchFn: typeof fetch): OpenTdbQuestionSource {
  let nextId = 0;
  return new OpenTdbQuestionSource({
    fetchFn,
    random: () => 0,
    createId: () => `id-${++nextId}`,
  });
}

const RESULTS = [
  {
    category: "Entertainment: Books",
    type: "multiple",
    difficulty: "easy",
    question: "Who wrote &quot;Hamlet&quot;?",
    correct_answer: "Shakespeare",
    incorrect_answers: ["Marlowe", "Jonson", "Kyd"],
  },
  {
    category: "Science &amp; Nature",
    type: "boolean",
    difficulty: "medium",
    question: "Water boils at 100&deg;C at sea level.",
    correct_answer: "True",
    incorrect_answers: ["False"],
  },
];

describe("OpenTdbQuestionSource", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("buildUrl", () => {
    it("omits category and difficulty when set to any", () => {
      const source = new OpenTdbQuestionSource();
      expect(source.buildUrl(TEST_CONFIG)).toBe(
        "https://opentdb.com/api.php?amount=3&type=multiple",
      );
    });

    it("includes every filter that is set", () => {
      const source = new OpenTdbQuestionSource({
        baseUrl: "http://localhost:4000/api.php",
      });
      expect(
        source.buildUrl({
          questionCount: 10,
          category: 9,
          difficulty: "hard",
          type: "boolean",
          timerSeconds: 30,
        }),
      ).toBe(
        "http://localhost:4000/api.php?amount=10&category=9&difficulty=hard&type=boolean",
      );
    });
  });

  describe("fetch", () => {
    it("requests the built URL and normalizes every question", async () => {
      const fetchFn = jsonFetch({ response_code: 0, results: RESULTS });
      const source = createSource(fetchFn);

      const questions = await source.fetch({ ...TEST_CONFIG, questionCount: 2 });

      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(fetchFn).toHaveBeenCalledWith(
        "https://opentdb.com/api.php?amount=2&type=multiple",
      );
      expect(questions).toEqual([
        {
          id: "id-1",
          text: 'Who wrote "Hamlet"?',
          answers: ["Jonson", "Kyd", "Shakespeare", "Marlowe"],
          correctAnswer: "Shakespeare",
          category: "Entertainment: Books",
          difficulty: "easy",
        },
        {
          id: "id-2",
          text: "Water boils at 100°C at sea level.",
          answers: ["True", "False"],
          correctAnswer: "True",
          category: "Science & Nature",
          difficulty: "medium",
        },
      ]);
    });

    it("sanitizes answers so the correct one can be matched by equality", async () => {
      const source = createSource(
        jsonFetch({
          response_code: 0,
          results: [
            {
              question: "Pick one",
              correct_answer: "Tom &amp; Jerry",
              incorrect_answers: ["Rock &amp; Roll", "Salt &amp; Pepper"],
            },
          ],
        }),
      );

      const [question] = await source.fetch({ ...TEST_CONFIG, questionCount: 1 });

      expect(question.correctAnswer).toBe("Tom & Jerry");
      expect(question.answers).toContain("Tom & Jerry");
      expect(question.answers).toContain("Rock & Roll");
      expect(question.category).toBeNull();
      expect(question.difficulty).toBeNull();
    });

    it("drops incorrect answers that decode to the correct answer", async () => {
      const source = createSource(
        jsonFetch({
          response_code: 0,
          results: [
            {
              question: "Which duo?",
              correct_answer: "Tom & Jerry",
              incorrect_answers: ["Tom &amp; Jerry", "Laurel & Hardy"],
            },
          ],
        }),
      );

      const [question] = await source.fetch({ ...TEST_CONFIG, questionCount: 1 });

      expect(question.answers).toHaveLength(2);
      expect(question.answers.filter((a) => a === "Tom & Jerry")).toHaveLength(1);
    });

    it("returns fewer questions than requested without padding", async () => {
      const source = createSource(jsonFetch({ response_code: 0, results: RESULTS }));

      const questions = await source.fetch({ ...TEST_CONFIG, questionCount: 5 });

      expect(questions).toHaveLength(2);
      expect(console.warn).toHaveBeenCalledWith(
        "[QuestionSource] Requested 5 questions, received 2",
      );
    });

    it("fails with network-unreachable when the request fails", async () => {
      const impl: typeof fetch = async () => {
        throw new TypeError("getaddrinfo ENOTFOUND opentdb.com");
      };
      const source = createSource(vi.fn(impl));

      const result = source.fetch(TEST_CONFIG);

      await expect(result).rejects.toBeInstanceOf(FetchError);
      await expect(result).rejects.toMatchObject({
        kind: "network-unreachable",
      });
    });

    it("fails with http-status on a server error", async () => {
      const source = createSource(fakeFetch("oops", { status: 500 }));

      await expect(source.fetch(TEST_CONFIG)).rejects.toMatchObject({
        kind: "http-status",
        status: 500,
      });
    });

    it("fails with rate-limited on HTTP 429", async () => {
      const source = createSource(fakeFetch("slow down", { status: 429 }));

      await expect(source.fetch(TEST_CONFIG)).rejects.toMatchObject({
        kind: "rate-limited",
        status: 429,
      });
    });

    it("fails with invalid-response when the body is not JSON", async () => {
      const source = createSource(fakeFetch("<html>maintenance</html>"));

      await expect(source.fetch(TEST_CONFIG)).rejects.toMatchObject({
        kind: "invalid-response",
      });
    });

    it("fails with invalid-response when the shape is wrong", async () => {
      const source = createSource(
        jsonFetch({ response_code: 0, results: [{ question: 42 }] }),
      );

      await expect(source.fetch(TEST_CONFIG)).rejects.toMatchObject({
        kind: "invalid-response",
      });
    });

    it.each([
      [1, "no-results"],
      [2, "invalid-request"],
      [3, "invalid-request"],
      [4, "invalid-request"],
      [5, "rate-limited"],
      [99, "invalid-response"],
    ])("maps response_code %i to %s", async (code, kind) => {
      const source = createSource(jsonFetch({ response_code: code, results: [] }));

      await expect(source.fetch(TEST_CONFIG)).rejects.toMatchObject({ kind });
    });

    it("fails with no-results on an empty result list", async () => {
      const source = createSource(jsonFetch({ response_code: 0, results: [] }));

      await expect(source.fetch(TEST_CONFIG)).rejects.toMatchObject({
        kind: "no-results",
      });
    });
  });
});
