// CHANGE: Pure bounds construction and range checking
// WHY: Range validation is a total function over integers; the shell only retries on Left
// FORMAT THEOREM: ∀v, b: checkRange(v, b) = Right(v) ↔ b.min ≤ v ≤ b.max
// PURITY: CORE
// COMPLEXITY: O(1)

import { Either } from "effect";

import { InvalidBounds, OutOfRange } from "./errors.js";
import type { Bounds } from "./models.js";

/**
 * Widest range the secret can be drawn from uniformly: Effect's PRNG
 * reduces the span of `Random.nextIntBetween` to an unsigned 32-bit integer.
 */
export const MAX_BOUNDS_SPAN = 0xffff_ffff;

/**
 * Builds validated bounds.
 *
 * @returns Right(bounds) when both ends are safe integers, min ≤ max and the
 * range holds at most {@link MAX_BOUNDS_SPAN} values
 *
 * @pure true
 * @invariant Right(b) → b.min ≤ b.max ∧ b.max - b.min < MAX_BOUNDS_SPAN
 */
export const makeBounds = (
	min: number,
	max: number,
): Either.Either<Bounds, InvalidBounds> =>
	Number.isSafeInteger(min) &&
	Number.isSafeInteger(max) &&
	min <= max &&
	max - min < MAX_BOUNDS_SPAN
		? Either.right({ min, max })
		: Either.left(new InvalidBounds({ min, max }));

/**
 * Accepts a value inside the inclusive bounds and names the violated bound otherwise.
 *
 * @pure true
 * @postcondition Right(v) → bounds.min ≤ v ≤ bounds.max
 */
export const checkRange = (
	value: number,
	bounds: Bounds,
): Either.Either<number, OutOfRange> => {
	if (value < bounds.min) {
		return Either.left(
			new OutOfRange({ value, bound: "min", limit: bounds.min }),
		);
	}
	if (value > bounds.max) {
		return Either.left(
			new OutOfRange({ value, bound: "max", limit: bounds.max }),
		);
	}
	return Either.right(value);
};
