// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, the pure CORE and the SHELL service tags with their layers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces, or Effect values
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Plays one game on the given services and returns an exit code.
 *
 * @example
 * ```typescript
 * import { Effect, Layer } from "effect";
 * import {
 *   DEFAULT_GAME_CONFIG,
 *   ConsoleOutputLive,
 *   NodeLineReaderLive,
 *   runGame,
 * } from "guessing-game";
 *
 * const code = await Effect.runPromise(
 *   runGame(DEFAULT_GAME_CONFIG).pipe(
 *     Effect.provide(Layer.merge(NodeLineReaderLive, ConsoleOutputLive)),
 *   ),
 * );
 * ```
 */
export { playGame, runGame } from "./app/runGame.js";
export { GameLive, main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	AwaitingGuess,
	Bounds,
	ExitCode,
	GameConfig,
	GameState,
	GameSummary,
	GuessOutcome,
	Step,
	Won,
} from "./core/models.js";
export {
	InputClosed,
	InputReadFailed,
	InvalidBounds,
	NotAnInteger,
	OutOfRange,
} from "./core/errors.js";
export type {
	FatalError,
	InputFailure,
	InputRejection,
} from "./core/errors.js";
export { advance, compareGuess, startGame } from "./core/game.js";
export {
	renderEcho,
	renderFatal,
	renderGreeting,
	renderOutcome,
	renderPrompt,
	renderRejection,
} from "./core/messages.js";
export { parseInteger } from "./core/parse.js";
export { checkRange, MAX_BOUNDS_SPAN, makeBounds } from "./core/range.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { DEFAULT_GAME_CONFIG, resolveBounds } from "./shell/config/index.js";
export { readGuessInRange, readInteger } from "./shell/input/reader.js";
export {
	LineReader,
	makeNodeLineReader,
	makeScriptedLineReader,
	NodeLineReaderLive,
} from "./shell/io/line-reader.js";
export type { LineReaderService } from "./shell/io/line-reader.js";
export {
	ConsoleOutputLive,
	GameOutput,
	makeRecordingOutput,
} from "./shell/io/output.js";
export type {
	GameOutputService,
	RecordingOutput,
} from "./shell/io/output.js";
export { drawSecret } from "./shell/random.js";
