// CHANGE: GameOutput service for user-facing text
// WHY: Console writes stay in SHELL; tests record lines instead of patching console
// PURITY: SHELL
// EFFECT: Effect<void>
// COMPLEXITY: O(n) per line where n = |line|

import { Console, Context, Effect, Layer } from "effect";

export interface GameOutputService {
	/** Prompts and feedback (stdout). */
	readonly println: (line: string) => Effect.Effect<void>;
	/** Diagnostics (stderr). */
	readonly eprintln: (line: string) => Effect.Effect<void>;
}

export class GameOutput extends Context.Tag("GameOutput")<
	GameOutput,
	GameOutputService
>() {}

export const ConsoleOutputLive: Layer.Layer<GameOutput> = Layer.succeed(
	GameOutput,
	{
		println: (line) => Console.log(line),
		eprintln: (line) => Console.error(line),
	},
);

export interface RecordingOutput {
	readonly layer: Layer.Layer<GameOutput>;
	readonly stdout: readonly string[];
	readonly stderr: readonly string[];
}

/**
 * Output that keeps every printed line in memory, in order.
 *
 * @pure false (appends to the returned arrays)
 */
export const makeRecordingOutput = (): RecordingOutput => {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const layer = Layer.succeed(GameOutput, {
		println: (line) => Effect.sync(() => void stdout.push(line)),
		eprintln: (line) => Effect.sync(() => void stderr.push(line)),
	});
	return { layer, stdout, stderr };
};
