// CHANGE: Tests for the game state machine
// FORMAT THEOREM: ∀s, g: advance(s, g).state.secret = s.secret

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { advance, compareGuess, startGame } from "../../src/core/game.js";
import type { AwaitingGuess } from "../../src/core/models.js";

describe("compareGuess", () => {
	it("orders guesses relative to the secret", () => {
		expect(compareGuess(3, 7)).toBe("TooSmall");
		expect(compareGuess(9, 7)).toBe("TooBig");
		expect(compareGuess(7, 7)).toBe("Correct");
	});

	it("reports Correct only for the secret itself", () => {
		fc.assert(
			fc.property(fc.integer(), fc.integer(), (guess, secret) => {
				expect(compareGuess(guess, secret) === "Correct").toBe(
					guess === secret,
				);
			}),
		);
	});
});

describe("startGame", () => {
	it("waits for the first guess with no attempts", () => {
		expect(startGame(42)).toEqual({
			_tag: "AwaitingGuess",
			secret: 42,
			attempts: 0,
		});
	});
});

describe("advance", () => {
	it("keeps waiting after a small guess", () => {
		expect(advance(startGame(7), 3)).toEqual({
			state: { _tag: "AwaitingGuess", secret: 7, attempts: 1 },
			outcome: "TooSmall",
		});
	});

	it("keeps waiting after a big guess", () => {
		expect(advance(startGame(7), 9)).toEqual({
			state: { _tag: "AwaitingGuess", secret: 7, attempts: 1 },
			outcome: "TooBig",
		});
	});

	it("wins on the secret", () => {
		const afterMiss = advance(startGame(7), 3).state;
		expect(afterMiss._tag).toBe("AwaitingGuess");
		if (afterMiss._tag === "AwaitingGuess") {
			expect(advance(afterMiss, 7)).toEqual({
				state: { _tag: "Won", secret: 7, attempts: 2 },
				outcome: "Correct",
			});
		}
	});

	it("never changes the secret across non-winning guesses", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 100 }),
				fc.array(fc.integer({ min: 1, max: 100 }), { maxLength: 50 }),
				(secret, guesses) => {
					const misses = guesses.filter((g) => g !== secret);
					let state: AwaitingGuess = startGame(secret);
					for (const guess of misses) {
						const step = advance(state, guess);
						if (step.state._tag === "Won") {
							throw new Error("a miss must not win");
						}
						state = step.state;
					}
					expect(state.secret).toBe(secret);
					expect(state.attempts).toBe(misses.length);
				},
			),
		);
	});
});
