// CHANGE: Application layer orchestration for one game
// WHY: APP composes CORE transitions with SHELL services and turns fatal errors into an ExitCode
// PURITY: APP (no process.exit; output goes through GameOutput)
// EFFECT: Effect<ExitCode, never, LineReader | GameOutput>
// INVARIANT: ExitCode = 0 ↔ the secret was guessed
// COMPLEXITY: O(k) where k = lines read

import { Effect } from "effect";

import type { FatalError, InputFailure } from "../core/errors.js";
import { advance, startGame } from "../core/game.js";
import {
	renderEcho,
	renderFatal,
	renderGreeting,
	renderOutcome,
	renderPrompt,
} from "../core/messages.js";
import type {
	AwaitingGuess,
	Bounds,
	ExitCode,
	GameConfig,
	GameSummary,
} from "../core/models.js";
import { resolveBounds } from "../shell/config/index.js";
import { readGuessInRange } from "../shell/input/reader.js";
import type { LineReader } from "../shell/io/line-reader.js";
import { GameOutput } from "../shell/io/output.js";
import { drawSecret } from "../shell/random.js";

/**
 * Plays one game against a known secret until it is guessed.
 *
 * @param bounds - Validated bounds; the secret must lie within them
 * @param secret - Secret number, fixed for the whole game
 *
 * @pure false (reads lines, prints feedback)
 * @effect Effect<GameSummary, InputFailure, LineReader | GameOutput>
 * @invariant secret is never reassigned; every loop iteration prompts once
 */
export const playGame = (
	bounds: Bounds,
	secret: number,
): Effect.Effect<GameSummary, InputFailure, LineReader | GameOutput> =>
	Effect.gen(function* () {
		const output = yield* GameOutput;
		yield* output.println(renderGreeting());

		let state: AwaitingGuess = startGame(secret);
		for (;;) {
			yield* output.println(renderPrompt(bounds));
			const guess = yield* readGuessInRange(bounds);
			yield* output.println(renderEcho(guess));

			const step = advance(state, guess);
			yield* output.println(renderOutcome(step.outcome));
			yield* Effect.logDebug("guess evaluated").pipe(
				Effect.annotateLogs({
					attempt: step.state.attempts,
					outcome: step.outcome,
				}),
			);

			if (step.state._tag === "Won") {
				return { secret: step.state.secret, attempts: step.state.attempts };
			}
			state = step.state;
		}
	});

const reportFatal = (
	error: FatalError,
): Effect.Effect<ExitCode, never, GameOutput> => {
	const failure: ExitCode = 1;
	return GameOutput.pipe(
		Effect.flatMap((output) =>
			output.eprintln(`Fatal error: ${renderFatal(error)}`),
		),
		Effect.as(failure),
	);
};

/**
 * Validates the configuration, draws the secret and plays one game.
 *
 * @returns ExitCode (0 on a correct guess, 1 on a fatal error)
 *
 * @pure false
 * @effect Effect<ExitCode, never, LineReader | GameOutput>
 * @postcondition fatal errors are reported on stderr exactly once
 */
export const runGame = (
	config: GameConfig,
): Effect.Effect<ExitCode, never, LineReader | GameOutput> => {
	const success: ExitCode = 0;
	return Effect.gen(function* () {
		const bounds = yield* resolveBounds(config);
		const secret = yield* drawSecret(bounds);
		yield* playGame(bounds, secret);
		return success;
	}).pipe(Effect.catchAll(reportFatal));
};
