// CHANGE: Retrying input readers built from CORE parsing and range checks
// WHY: Each failure path prints its message and loops; only a stream failure leaves the loop
// PURITY: SHELL
// EFFECT: Effect<number, InputFailure, LineReader | GameOutput>
// INVARIANT: Rejections (NotAnInteger, OutOfRange) never escape these readers
// COMPLEXITY: O(k) reads where k = lines until an accepted value

import { Effect, Either } from "effect";

import type { InputFailure } from "../../core/errors.js";
import { renderRejection } from "../../core/messages.js";
import type { Bounds } from "../../core/models.js";
import { parseInteger } from "../../core/parse.js";
import { checkRange } from "../../core/range.js";
import { GameOutput } from "../io/output.js";
import { LineReader } from "../io/line-reader.js";

/**
 * Reads lines until one parses as an integer.
 *
 * @effect Effect<number, InputFailure, LineReader | GameOutput>
 * @postcondition result is a safe integer
 */
export const readInteger: Effect.Effect<
	number,
	InputFailure,
	LineReader | GameOutput
> = Effect.gen(function* () {
	const reader = yield* LineReader;
	const output = yield* GameOutput;
	for (;;) {
		const parsed = parseInteger(yield* reader.readLine);
		if (Either.isRight(parsed)) return parsed.right;
		yield* output.println(renderRejection(parsed.left));
	}
});

/**
 * Reads integers until one lies within the bounds.
 *
 * @postcondition bounds.min ≤ result ≤ bounds.max
 */
export const readGuessInRange = (
	bounds: Bounds,
): Effect.Effect<number, InputFailure, LineReader | GameOutput> =>
	Effect.gen(function* () {
		const output = yield* GameOutput;
		for (;;) {
			const checked = checkRange(yield* readInteger, bounds);
			if (Either.isRight(checked)) return checked.right;
			yield* output.println(renderRejection(checked.left));
		}
	});
