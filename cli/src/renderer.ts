/**
 * Terminal renderer: prints session events as plain text lines.
 */

import type { EventBus } from "../../core/src/eventBus.js";
import type {
  GameSnapshot,
  SessionEvents,
  SubmissionOutcome,
} from "../../core/src/types.js";

export type LineWriter = (line: string) => void;

/** Countdown values worth announcing */
function shouldAnnounce(remainingSeconds: number): boolean {
  return remainingSeconds <= 5 || remainingSeconds % 10 === 0;
}

export function formatQuestion(snapshot: GameSnapshot): string[] {
  const { question } = snapshot;
  if (!question) return [];

  const tags = [question.category, question.difficulty].filter(
    (tag): tag is string => tag !== null,
  );
  const header = `Question ${snapshot.currentIndex + 1}/${snapshot.totalQuestions}`;

  return [
    "",
    tags.length > 0 ? `${header} [${tags.join(" · ")}]` : header,
    question.text,
    ...question.answers.map((answer, i) => `  ${i + 1}) ${answer}`),
    `⏱  ${snapshot.remainingSeconds}s left. Type a number to choose, Enter to submit`,
  ];
}

export function formatOutcome(outcome: SubmissionOutcome): string {
  const verdict = outcome.correct ? "✅ Correct!" : "❌ Incorrect :(";
  const suffix = outcome.trigger === "timeout" ? " (time's up)" : "";
  return `${verdict}${suffix}  Score: ${outcome.score}`;
}

/** Attach to a session's event bus; returns a detach function */
export function attachRenderer(
  events: EventBus<SessionEvents>,
  write: LineWriter = console.log,
): () => void {
  const onLoading = () => write("Loading questions...");
  const onLoaded = ({ requested, received }: SessionEvents["session:loaded"][0]) => {
    if (received < requested) {
      write(`Only ${received} of ${requested} questions available.`);
    }
  };
  const onFetchFailed = (error: SessionEvents["session:fetch-failed"][0]) => {
    write(`Could not load questions (${error.kind}): ${error.message}`);
    write("Type r to retry, q to quit.");
  };
  const onQuestion = (snapshot: GameSnapshot) => {
    formatQuestion(snapshot).forEach((line) => write(line));
  };
  const onSelected = ({ answer }: SessionEvents["session:answer-selected"][0]) =>
    write(`Selected: ${answer}`);
  const onTick = ({ remainingSeconds }: SessionEvents["session:tick"][0]) => {
    if (remainingSeconds > 0 && shouldAnnounce(remainingSeconds)) {
      write(`⏱  ${remainingSeconds}s left`);
    }
  };
  const onSubmitted = (outcome: SubmissionOutcome) => write(formatOutcome(outcome));
  const onFinished = ({ score, total }: SessionEvents["session:finished"][0]) => {
    write("");
    write(`🏁 Final Score: ${score}/${total}`);
    write("Type r to play again, q to quit.");
  };

  events.on("session:loading", onLoading);
  events.on("session:loaded", onLoaded);
  events.on("session:fetch-failed", onFetchFailed);
  events.on("session:question", onQuestion);
  events.on("session:answer-selected", onSelected);
  events.on("session:tick", onTick);
  events.on("session:submitted", onSubmitted);
  events.on("session:finished", onFinished);

  return () => {
    events.off("session:loading", onLoading);
    events.off("session:loaded", onLoaded);
    events.off("session:fetch-failed", onFetchFailed);
    events.off("session:question", onQuestion);
    events.off("session:answer-selected", onSelected);
    events.off("session:tick", onTick);
    events.off("session:submitted", onSubmitted);
    events.off("session:finished", onFinished);
  };
}
