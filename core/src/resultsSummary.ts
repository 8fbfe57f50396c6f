import type { ResultsSummary } from "./types.js";
import type { GameSession } from "./gameSession.js";

/** Final score of a finished session; null until the session is over */
export function summarize(session: GameSession): ResultsSummary | null {
  if (!session.isOver) return null;
  return {
    score: session.score,
    // What was actually played, which can be fewer than requested
    total: session.questions.length,
  };
}
