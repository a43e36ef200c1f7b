// CHANGE: Pure renderers for every line the game prints
// WHY: SHELL only writes strings; wording is decided (and tested) in CORE
// PURITY: CORE
// INVARIANT: Each renderer is total over its input union (exhaustive match)
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { FatalError, InputRejection } from "./errors.js";
import type { Bounds, GuessOutcome } from "./models.js";
import { MAX_BOUNDS_SPAN } from "./range.js";

export const renderGreeting = (): string => "Guess the number!";

export const renderPrompt = (bounds: Bounds): string =>
	`Please input your guess, between ${bounds.min} and ${bounds.max}.`;

export const renderEcho = (guess: number): string => `You guessed: ${guess}`;

/**
 * Corrective message for input the readers ask again for.
 *
 * @pure true
 * @invariant Out-of-range messages name the violated limit
 */
export const renderRejection = (rejection: InputRejection): string =>
	match(rejection)
		.with({ _tag: "NotAnInteger" }, () => "Please input a number.")
		.with(
			{ _tag: "OutOfRange", bound: "min" },
			({ limit }) => `Please input a number no smaller than ${limit}.`,
		)
		.with(
			{ _tag: "OutOfRange", bound: "max" },
			({ limit }) => `Please input a number no larger than ${limit}.`,
		)
		.exhaustive();

export const renderOutcome = (outcome: GuessOutcome): string =>
	match(outcome)
		.with("TooSmall", () => "Too small!")
		.with("TooBig", () => "Too big!")
		.with("Correct", () => "You win!")
		.exhaustive();

/**
 * Diagnostic printed on stderr before a failed run exits.
 *
 * @pure true
 */
export const renderFatal = (error: FatalError): string =>
	match(error)
		.with(
			{ _tag: "InputClosed" },
			() => "input ended before the secret number was guessed",
		)
		.with(
			{ _tag: "InputReadFailed" },
			({ detail }) => `failed to read input: ${detail}`,
		)
		.with(
			{ _tag: "InvalidBounds" },
			({ min, max }) =>
				`invalid bounds [${min}, ${max}]: expected safe integers with min <= max spanning at most ${MAX_BOUNDS_SPAN} values`,
		)
		.exhaustive();
