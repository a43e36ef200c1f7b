// CHANGE: LineReader service isolating stdin behind an Effect Context.Tag
// WHY: APP and the input readers depend on an interface; tests swap in a scripted source
// PURITY: SHELL
// EFFECT: Effect<string, InputClosed | InputReadFailed>
// INVARIANT: Lines are delivered once each, in stream order; end of stream fails with InputClosed
// COMPLEXITY: O(1) per line (amortized over the stream)

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import { Context, Effect, Layer } from "effect";

import { InputClosed, InputReadFailed } from "../../core/errors.js";
import type { InputFailure } from "../../core/errors.js";

export interface LineReaderService {
	/** Next line without its terminator; fails once the stream is exhausted. */
	readonly readLine: Effect.Effect<string, InputFailure>;
}

export class LineReader extends Context.Tag("LineReader")<
	LineReader,
	LineReaderService
>() {}

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Line reader over a Node readable stream (stdin in production).
 *
 * @remarks
 * The readline interface is a scoped resource: it is closed when the scope
 * that built the layer closes, on success and on failure alike.
 *
 * @pure false (reads from the stream)
 */
export const makeNodeLineReader = (input: Readable): Layer.Layer<LineReader> =>
	Layer.scoped(
		LineReader,
		Effect.acquireRelease(
			Effect.sync(() =>
				createInterface({ input, terminal: false, crlfDelay: Infinity }),
			),
			(rl) => Effect.sync(() => rl.close()),
		).pipe(
			Effect.map((rl): LineReaderService => {
				const lines = rl[Symbol.asyncIterator]();
				return {
					readLine: Effect.tryPromise({
						try: () => lines.next(),
						catch: (error) =>
							new InputReadFailed({ detail: describeError(error) }),
					}).pipe(
						Effect.flatMap((result) =>
							result.done === true
								? Effect.fail(new InputClosed())
								: Effect.succeed(result.value),
						),
					),
				};
			}),
		),
	);

export const NodeLineReaderLive: Layer.Layer<LineReader> = Layer.suspend(() =>
	makeNodeLineReader(process.stdin),
);

/**
 * In-memory line reader replaying a fixed script, then reporting end of input.
 *
 * @pure false (advances an internal cursor)
 */
export const makeScriptedLineReader = (
	lines: readonly string[],
): Layer.Layer<LineReader> =>
	Layer.sync(LineReader, () => {
		let cursor = 0;
		return {
			readLine: Effect.suspend(() => {
				const line = lines[cursor];
				if (line === undefined) {
					return Effect.fail(new InputClosed());
				}
				cursor += 1;
				return Effect.succeed(line);
			}),
		};
	});
