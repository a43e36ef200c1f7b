// CHANGE: Introduce Functional Core domain models for the guessing game
// WHY: CORE holds only immutable data; SHELL and APP build on these types
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the game process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Inclusive range shared by the secret number and every accepted guess.
 *
 * @remarks
 * - @invariant Number.isSafeInteger(min) ∧ Number.isSafeInteger(max) ∧ min ≤ max
 * - Only {@link makeBounds} produces values that satisfy the invariant.
 */
export interface Bounds {
	readonly min: number;
	readonly max: number;
}

/**
 * Raw game configuration before validation.
 */
export interface GameConfig {
	readonly min: number;
	readonly max: number;
}

/**
 * Result of comparing a guess with the secret number.
 */
export type GuessOutcome = "TooSmall" | "TooBig" | "Correct";

export interface AwaitingGuess {
	readonly _tag: "AwaitingGuess";
	readonly secret: number;
	readonly attempts: number;
}

export interface Won {
	readonly _tag: "Won";
	readonly secret: number;
	readonly attempts: number;
}

/**
 * Game state machine.
 *
 * @remarks
 * - @invariant secret is fixed for the lifetime of a game
 * - @invariant attempts counts validated guesses only
 * - Won is terminal: no transition accepts it as input
 */
export type GameState = AwaitingGuess | Won;

/**
 * One evaluated guess: the state it led to and the outcome reported to the player.
 */
export interface Step {
	readonly state: GameState;
	readonly outcome: GuessOutcome;
}

/**
 * Summary returned once the secret has been found.
 */
export interface GameSummary {
	readonly secret: number;
	readonly attempts: number;
}
