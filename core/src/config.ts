/**
 * Config: application configuration loader.
 *
 * Merges a partial config over the defaults, applies environment
 * variable overrides, and validates the result.
 */

import { z } from "zod";
import type {
  AppConfig,
  ApiConfig,
  CategorySelector,
  GameConfiguration,
  TimingConfig,
} from "./types.js";
import { DEFAULT_API_URL } from "./questionSource.js";

export interface AppConfigInput {
  api?: Partial<ApiConfig>;
  game?: Partial<GameConfiguration>;
  timing?: Partial<TimingConfig>;
}

/** Default config values */
export const DEFAULT_APP_CONFIG: AppConfig = {
  api: {
    baseUrl: DEFAULT_API_URL,
  },
  game: {
    questionCount: 5,
    category: "any",
    difficulty: "any",
    type: "multiple",
    timerSeconds: 30,
  },
  timing: {
    tickIntervalMs: 1000,
    reviewDelayMs: 1000,
  },
};

/** Longest delay setTimeout/setInterval honour; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const difficultySchema = z.enum(["any", "easy", "medium", "hard"]);
export const questionTypeSchema = z.enum(["multiple", "boolean"]);

export const gameConfigurationSchema: z.ZodType<GameConfiguration> = z.object({
  questionCount: z.number().int().min(1).max(50),
  category: z.union([z.literal("any"), z.number().int().positive()]),
  difficulty: difficultySchema,
  type: questionTypeSchema,
  timerSeconds: z.number().int().positive(),
});

const appConfigSchema: z.ZodType<AppConfig> = z.object({
  api: z.object({
    baseUrl: z.string().url(),
  }),
  game: gameConfigurationSchema,
  timing: z.object({
    tickIntervalMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS),
    reviewDelayMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS),
  }),
});

/**
 * Merge a partial config over the defaults and validate it.
 * Throws a ZodError describing every invalid field.
 */
export function loadAppConfig(raw: AppConfigInput = {}): AppConfig {
  return appConfigSchema.parse({
    api: { ...DEFAULT_APP_CONFIG.api, ...raw.api },
    game: { ...DEFAULT_APP_CONFIG.game, ...raw.game },
    timing: { ...DEFAULT_APP_CONFIG.timing, ...raw.timing },
  });
}

/**
 * Load config with environment variable overrides.
 */
export function loadAppConfigWithEnv(
  raw: AppConfigInput = {},
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const api: Partial<ApiConfig> = { ...raw.api };
  const game: Partial<GameConfiguration> = { ...raw.game };
  const timing: Partial<TimingConfig> = { ...raw.timing };

  // Apply env overrides
  if (env.TRIVIA_API_URL) api.baseUrl = env.TRIVIA_API_URL;
  if (env.TRIVIA_QUESTION_COUNT) {
    game.questionCount = Number(env.TRIVIA_QUESTION_COUNT);
  }
  if (env.TRIVIA_CATEGORY) game.category = parseCategory(env.TRIVIA_CATEGORY);
  if (env.TRIVIA_DIFFICULTY) {
    game.difficulty = difficultySchema.parse(env.TRIVIA_DIFFICULTY);
  }
  if (env.TRIVIA_TYPE) game.type = questionTypeSchema.parse(env.TRIVIA_TYPE);
  if (env.TRIVIA_TIMER_SECONDS) {
    game.timerSeconds = Number(env.TRIVIA_TIMER_SECONDS);
  }
  if (env.TRIVIA_REVIEW_DELAY_MS) {
    timing.reviewDelayMs = Number(env.TRIVIA_REVIEW_DELAY_MS);
  }

  return loadAppConfig({ api, game, timing });
}

/** "any" (any case) or a numeric category id; range is checked on load */
export function parseCategory(value: string): CategorySelector {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === "any") return "any";
  return Number(trimmed);
}
