// CHANGE: Pure integer parsing for one line of player input
// WHY: Keep parsing in CORE so the shell reader only sequences IO and retries
// FORMAT THEOREM: ∀s: parseInteger(s) = Right(n) ↔ trim(s) ∈ /^[+-]?\d+$/ ∧ isSafeInteger(n)
// PURITY: CORE
// INVARIANT: Deterministic; identical input yields identical result
// COMPLEXITY: O(n) where n = |line|

import { Either } from "effect";

import { NotAnInteger } from "./errors.js";

const SIGNED_DECIMAL = /^[+-]?\d+$/u;

/**
 * Parses a line as a base-10 signed integer.
 *
 * @param line - Raw line as read from the input stream (without the newline)
 * @returns Right(integer) or Left(NotAnInteger) carrying the trimmed input
 *
 * @pure true
 * @invariant Right values are safe integers
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseInteger("  42 ");  // Right(42)
 * parseInteger("-7");     // Right(-7)
 * parseInteger("4.2");    // Left(NotAnInteger)
 * ```
 */
export const parseInteger = (
	line: string,
): Either.Either<number, NotAnInteger> => {
	const input = line.trim();
	if (!SIGNED_DECIMAL.test(input)) {
		return Either.left(new NotAnInteger({ input }));
	}
	const value = Number.parseInt(input, 10);
	// Digits beyond 2^53 - 1 cannot be compared exactly.
	return Number.isSafeInteger(value)
		? Either.right(value)
		: Either.left(new NotAnInteger({ input }));
};
