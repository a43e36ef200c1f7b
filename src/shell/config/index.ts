// CHANGE: Game configuration defaults and validation
// WHY: Bounds are fixed at start-up; invalid settings fail as a typed error instead of throwing
// PURITY: SHELL (configuration only)
// INVARIANT: resolveBounds succeeds ↔ config holds safe integers with min ≤ max

import { Effect, Either } from "effect";

import type { InvalidBounds } from "../../core/errors.js";
import type { Bounds, GameConfig } from "../../core/models.js";
import { makeBounds } from "../../core/range.js";

export const DEFAULT_GAME_CONFIG: GameConfig = { min: 1, max: 100 };

/**
 * Validates configured bounds.
 *
 * @effect Effect<Bounds, InvalidBounds>
 */
export const resolveBounds = (
	config: GameConfig,
): Effect.Effect<Bounds, InvalidBounds> =>
	Either.match(makeBounds(config.min, config.max), {
		onLeft: (error) => Effect.fail(error),
		onRight: (bounds) => Effect.succeed(bounds),
	});
