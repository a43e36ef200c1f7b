// CHANGE: Typed error ADT for the guessing game using Effect.Data
// WHY: Errors are values discriminated by `_tag`, never runtime exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Recoverable rejections never escape the shell readers; fatal errors reach APP
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Line could not be parsed as a base-10 signed safe integer.
 *
 * @pure true (Data class)
 * @remarks Recoverable: handled by the input reader, never surfaces past it.
 */
export class NotAnInteger extends Data.TaggedError("NotAnInteger")<{
	readonly input: string;
}> {}

/**
 * Parsed integer lies outside the inclusive bounds.
 *
 * @pure true (Data class)
 * @invariant bound = "min" → value < limit; bound = "max" → value > limit
 */
export class OutOfRange extends Data.TaggedError("OutOfRange")<{
	readonly value: number;
	readonly bound: "min" | "max";
	readonly limit: number;
}> {}

/**
 * Input stream reached its end before the game finished.
 */
export class InputClosed extends Data.TaggedError("InputClosed")<{}> {}

/**
 * Input stream emitted an error.
 *
 * @invariant detail.length > 0
 */
export class InputReadFailed extends Data.TaggedError("InputReadFailed")<{
	readonly detail: string;
}> {}

/**
 * Configured bounds are not safe integers or violate min ≤ max.
 */
export class InvalidBounds extends Data.TaggedError("InvalidBounds")<{
	readonly min: number;
	readonly max: number;
}> {}

/** Rejections the readers recover from by asking again. */
export type InputRejection = NotAnInteger | OutOfRange;

/** Unreadable input; aborts the run. */
export type InputFailure = InputClosed | InputReadFailed;

/**
 * Union of errors that terminate a run with exit code 1.
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type FatalError = InputFailure | InvalidBounds;
