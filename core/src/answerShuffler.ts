/**
 * AnswerShuffler: builds the display order of a question's answers.
 */

/** Source of uniform random numbers in [0, 1) */
export type RandomSource = () => number;

/** Fisher–Yates shuffle; returns a new array */
export function shuffle<T>(
  items: readonly T[],
  random: RandomSource = Math.random,
): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Combine the correct answer with the incorrect ones and shuffle them.
 * The result has `incorrect.length + 1` entries.
 */
export function shuffleAnswers(
  correct: string,
  incorrect: readonly string[],
  random: RandomSource = Math.random,
): string[] {
  return shuffle([...incorrect, correct], random);
}
