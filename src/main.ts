// CHANGE: Make main.ts a thin APP delegator
// WHY: main wires live layers and delegates orchestration to app/runGame
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect, Layer } from "effect";

import { runGame } from "./app/runGame.js";
import type { ExitCode } from "./core/models.js";
import { DEFAULT_GAME_CONFIG } from "./shell/config/index.js";
import { NodeLineReaderLive } from "./shell/io/line-reader.js";
import { ConsoleOutputLive } from "./shell/io/output.js";

export const GameLive = Layer.merge(NodeLineReaderLive, ConsoleOutputLive);

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (reads stdin, writes stdout/stderr), but does not call process.exit
 */
export function main(): Promise<ExitCode> {
	return Effect.runPromise(
		runGame(DEFAULT_GAME_CONFIG).pipe(Effect.provide(GameLive)),
	);
}
