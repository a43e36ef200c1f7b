// CHANGE: Pure state machine for the game loop
// WHY: The loop in APP becomes read → advance → render; all decisions live here
// FORMAT THEOREM: ∀s, g: advance(s, g).state._tag = "Won" ↔ g = s.secret
// PURITY: CORE
// INVARIANT: secret never changes across transitions; attempts grows by exactly 1 per step
// COMPLEXITY: O(1) per transition

import type { AwaitingGuess, GuessOutcome, Step } from "./models.js";

/**
 * Orders a guess relative to the secret.
 *
 * @pure true
 * @invariant result = "Correct" ↔ guess = secret
 */
export const compareGuess = (guess: number, secret: number): GuessOutcome => {
	if (guess < secret) return "TooSmall";
	if (guess > secret) return "TooBig";
	return "Correct";
};

/**
 * Initial state, entered once after the secret number is drawn.
 *
 * @pure true
 */
export const startGame = (secret: number): AwaitingGuess => ({
	_tag: "AwaitingGuess",
	secret,
	attempts: 0,
});

/**
 * Evaluates one validated guess.
 *
 * @param state - Only a game still waiting for a guess can advance
 * @param guess - Guess already checked against the bounds
 * @returns Next state and the outcome to report
 *
 * @pure true
 * @postcondition result.state.secret = state.secret
 * @postcondition result.state.attempts = state.attempts + 1
 */
export const advance = (state: AwaitingGuess, guess: number): Step => {
	const outcome = compareGuess(guess, state.secret);
	const attempts = state.attempts + 1;
	return outcome === "Correct"
		? { state: { _tag: "Won", secret: state.secret, attempts }, outcome }
		: {
				state: { _tag: "AwaitingGuess", secret: state.secret, attempts },
				outcome,
			};
};
