#!/usr/bin/env node
/**
 * trivia-quiz: terminal client
 *
 * Usage:
 *   trivia-quiz --amount 10 --difficulty easy --timer 30
 *   trivia-quiz --category 9 --type boolean
 */

import { createInterface } from "node:readline";
import { ZodError } from "zod";
import type { AppConfig, GameConfiguration } from "../../core/src/types.js";
import { loadAppConfig, loadAppConfigWithEnv } from "../../core/src/config.js";
import { OpenTdbQuestionSource } from "../../core/src/questionSource.js";
import { SessionController } from "../../core/src/sessionController.js";
import { HELP_TEXT, parseArgs } from "./args.js";
import { parseCommand } from "./commands.js";
import { attachRenderer } from "./renderer.js";

function printHelp(): void {
  console.log(HELP_TEXT);
}

/** Env supplies the base config; flags win over it */
function resolveConfig(game: Partial<GameConfiguration>): AppConfig {
  const base = loadAppConfigWithEnv();
  return loadAppConfig({
    api: base.api,
    game: { ...base.game, ...game },
    timing: base.timing,
  });
}

function formatConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `  ${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("\n");
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.kind === "help") {
    printHelp();
    return;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}`);
    printHelp();
    process.exitCode = 1;
    return;
  }

  let config: AppConfig;
  try {
    config = resolveConfig(parsed.game);
  } catch (error) {
    console.error(`❌ Invalid configuration:\n${formatConfigError(error)}`);
    process.exitCode = 1;
    return;
  }

  const { game } = config;
  console.log(`\n🎮 Trivia: ${game.questionCount} questions`);
  console.log(`   Category:   ${game.category}`);
  console.log(`   Difficulty: ${game.difficulty}`);
  console.log(`   Type:       ${game.type}`);
  console.log(`   Timer:      ${game.timerSeconds}s\n`);

  const controller = new SessionController({
    config: game,
    source: new OpenTdbQuestionSource({ baseUrl: config.api.baseUrl }),
    timing: config.timing,
  });
  const detach = attachRenderer(controller.events);

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const restart = () => {
    controller.restart().catch((err) => {
      console.error("[CLI] Restart error:", err);
    });
  };

  rl.on("line", (line) => {
    const snapshot = controller.snapshot();
    const command = parseCommand(line, snapshot);

    switch (command.type) {
      case "quit":
        rl.close();
        return;
      case "restart":
        restart();
        return;
      case "select":
        if (!controller.selectAnswer(command.answer)) {
          console.log("Answer is locked for this question.");
        }
        return;
      case "submit":
        if (snapshot.phase === "active" && snapshot.selectedAnswer === null) {
          console.log("Choose an answer first (type its number).");
          return;
        }
        controller.submit();
        return;
      case "unknown":
        console.log(`Unknown command "${command.input}". Type q to quit.`);
        return;
    }
  });

  rl.on("close", () => {
    detach();
    controller.destroy();
    console.log("Bye!");
  });

  await controller.start();
}

main().catch((error) => {
  console.error("❌ Unexpected error:", error);
  process.exitCode = 1;
});
