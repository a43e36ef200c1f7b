// CHANGE: Tests for the Node readline-backed LineReader
// WHY: Exercise the live layer against an in-process stream instead of stdin

import { Readable } from "node:stream";

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { InputClosed, InputReadFailed } from "../../../src/core/errors.js";
import {
	LineReader,
	makeNodeLineReader,
	makeScriptedLineReader,
} from "../../../src/shell/io/line-reader.js";
import { failingAfter } from "../../utils/streams.js";

const readAll = Effect.gen(function* () {
	const reader = yield* LineReader;
	const lines: string[] = [];
	for (;;) {
		const next = yield* Effect.either(reader.readLine);
		if (Either.isLeft(next)) return { lines, end: next.left };
		lines.push(next.right);
	}
});

describe("makeNodeLineReader", () => {
	it("yields lines in order, then InputClosed", async () => {
		const stream = Readable.from(["3\n", "abc\n", "7"]);
		const { lines, end } = await Effect.runPromise(
			readAll.pipe(Effect.provide(makeNodeLineReader(stream))),
		);
		expect(lines).toEqual(["3", "abc", "7"]);
		expect(end).toBeInstanceOf(InputClosed);
	});

	it("strips CRLF terminators", async () => {
		const stream = Readable.from(["1\r\n2\r\n"]);
		const { lines } = await Effect.runPromise(
			readAll.pipe(Effect.provide(makeNodeLineReader(stream))),
		);
		expect(lines).toEqual(["1", "2"]);
	});

	it("reports InputClosed immediately on an empty stream", async () => {
		const { lines, end } = await Effect.runPromise(
			readAll.pipe(Effect.provide(makeNodeLineReader(Readable.from([])))),
		);
		expect(lines).toEqual([]);
		expect(end._tag).toBe("InputClosed");
	});
});

describe("makeNodeLineReader: stream errors", () => {
	it("delivers buffered lines, then fails with InputReadFailed", async () => {
		const stream = failingAfter("3\n", "EIO");
		const [first, second] = await Effect.runPromise(
			Effect.gen(function* () {
				const reader = yield* LineReader;
				const a = yield* Effect.either(reader.readLine);
				const b = yield* Effect.either(reader.readLine);
				return [a, b] as const;
			}).pipe(Effect.provide(makeNodeLineReader(stream))),
		);
		expect(first).toEqual(Either.right("3"));
		expect(Either.isLeft(second)).toBe(true);
		if (Either.isLeft(second)) {
			expect(second.left).toBeInstanceOf(InputReadFailed);
			expect(second.left._tag).toBe("InputReadFailed");
			if (second.left._tag === "InputReadFailed") {
				expect(second.left.detail).toBe("EIO");
			}
		}
	});
});

describe("makeScriptedLineReader", () => {
	it("replays the script verbatim, then InputClosed", () => {
		const { lines, end } = Effect.runSync(
			readAll.pipe(Effect.provide(makeScriptedLineReader([" a ", ""]))),
		);
		expect(lines).toEqual([" a ", ""]);
		expect(end).toBeInstanceOf(InputClosed);
	});
});
