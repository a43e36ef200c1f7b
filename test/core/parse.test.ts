// CHANGE: Unit and property tests for integer parsing
// WHY: CORE parsing decides which lines the reader accepts
// FORMAT THEOREM: ∀n ∈ SafeInt: parseInteger(String(n)) = Right(n)

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { NotAnInteger } from "../../src/core/errors.js";
import { parseInteger } from "../../src/core/parse.js";

describe("parseInteger: accepted input", () => {
	it("parses plain digits", () => {
		expect(parseInteger("42")).toEqual(Either.right(42));
	});

	it("trims surrounding whitespace", () => {
		expect(parseInteger("  17\t")).toEqual(Either.right(17));
	});

	it("accepts an explicit sign", () => {
		expect(parseInteger("-8")).toEqual(Either.right(-8));
		expect(parseInteger("+5")).toEqual(Either.right(5));
	});

	it("round-trips every safe integer in its decimal form", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: -1_000_000_000, max: 1_000_000_000 }),
				(n) => {
					expect(parseInteger(` ${n} `)).toEqual(Either.right(n));
				},
			),
		);
	});
});

describe("parseInteger: rejected input", () => {
	it("rejects letters and keeps the trimmed input", () => {
		const result = parseInteger(" abc ");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left).toBeInstanceOf(NotAnInteger);
			expect(result.left.input).toBe("abc");
		}
	});

	it("rejects empty and blank lines", () => {
		expect(Either.isLeft(parseInteger(""))).toBe(true);
		expect(Either.isLeft(parseInteger("   "))).toBe(true);
	});

	it("rejects decimals, exponents and embedded spaces", () => {
		for (const line of ["4.2", "1e3", "1 2", "--3", "+", "0x10"]) {
			expect(Either.isLeft(parseInteger(line))).toBe(true);
		}
	});

	it("rejects integers beyond the safe range", () => {
		const result = parseInteger("9007199254740992");
		expect(Either.isLeft(result) && result.left.input).toBe(
			"9007199254740992",
		);
		expect(parseInteger("9007199254740991")).toEqual(
			Either.right(Number.MAX_SAFE_INTEGER),
		);
	});

	it("rejects any text without a digit", () => {
		fc.assert(
			fc.property(
				fc.string().filter((s) => !/\d/u.test(s)),
				(s) => {
					expect(Either.isLeft(parseInteger(s))).toBe(true);
				},
			),
		);
	});
});
