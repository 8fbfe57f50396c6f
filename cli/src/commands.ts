import type { GameSnapshot } from "../../core/src/types.js";

export type Command =
  | { type: "select"; answer: string }
  | { type: "submit" }
  | { type: "restart" }
  | { type: "quit" }
  | { type: "unknown"; input: string };

/** Interpret one line of terminal input against the current snapshot */
export function parseCommand(line: string, snapshot: GameSnapshot): Command {
  const input = line.trim().toLowerCase();

  if (input === "q" || input === "quit") return { type: "quit" };
  if (input === "r" || input === "restart") return { type: "restart" };
  if (input === "") return { type: "submit" };

  if (/^\d+$/.test(input) && snapshot.question) {
    const answer = snapshot.question.answers[Number(input) - 1];
    if (answer !== undefined) return { type: "select", answer };
  }

  return { type: "unknown", input: line.trim() };
}
