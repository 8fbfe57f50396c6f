/**
 * Command-line flag parsing for the trivia-quiz terminal client.
 */

import type { GameConfiguration } from "../../core/src/types.js";
import {
  difficultySchema,
  parseCategory,
  questionTypeSchema,
} from "../../core/src/config.js";

export type ParsedArgs =
  | { kind: "run"; game: Partial<GameConfiguration> }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
Usage:
  trivia-quiz [options]

Options:
  --amount <n>           Number of questions, 1-50 (default: 5)
  --category <id|any>    Open Trivia DB category id (default: any)
  --difficulty <level>   any, easy, medium, hard (default: any)
  --type <type>          multiple, boolean (default: multiple)
  --timer <seconds>      Seconds per question (default: 30)
  --help                 Show this help

While playing:
  <number>   choose an answer
  <enter>    submit the chosen answer
  r          restart (new questions)
  q          quit

Environment:
  TRIVIA_API_URL, TRIVIA_QUESTION_COUNT, TRIVIA_CATEGORY, TRIVIA_DIFFICULTY,
  TRIVIA_TYPE, TRIVIA_TIMER_SECONDS, TRIVIA_REVIEW_DELAY_MS
`;

const FLAGS = ["amount", "category", "difficulty", "type", "timer"] as const;
type Flag = (typeof FLAGS)[number];

function isFlag(key: string): key is Flag {
  return FLAGS.some((flag) => flag === key);
}

/** Parse argv (without node and script path) into game overrides */
export function parseArgs(args: string[]): ParsedArgs {
  const game: Partial<GameConfiguration> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (!arg.startsWith("--")) {
      return { kind: "error", message: `Unexpected argument "${arg}"` };
    }

    const key = arg.slice(2);
    if (!isFlag(key)) {
      return { kind: "error", message: `Unknown option "${arg}"` };
    }
    const value = args[++i];
    if (value === undefined || value.startsWith("--")) {
      return { kind: "error", message: `Missing value for "${arg}"` };
    }

    switch (key) {
      case "amount":
        game.questionCount = Number(value);
        break;
      case "category":
        game.category = parseCategory(value);
        break;
      case "difficulty": {
        const parsed = difficultySchema.safeParse(value.toLowerCase());
        if (!parsed.success) {
          return {
            kind: "error",
            message: `Invalid difficulty "${value}". Valid: ${difficultySchema.options.join(", ")}`,
          };
        }
        game.difficulty = parsed.data;
        break;
      }
      case "type": {
        const parsed = questionTypeSchema.safeParse(value.toLowerCase());
        if (!parsed.success) {
          return {
            kind: "error",
            message: `Invalid type "${value}". Valid: ${questionTypeSchema.options.join(", ")}`,
          };
        }
        game.type = parsed.data;
        break;
      }
      case "timer":
        game.timerSeconds = Number(value);
        break;
    }
  }

  return { kind: "run", game };
}
