// CHANGE: Draw the secret number through Effect's Random service
// WHY: Production uses the default generator; tests seed it with Effect.withRandom
// PURITY: SHELL
// INVARIANT: bounds.min ≤ secret ≤ bounds.max, uniform over the inclusive range
// COMPLEXITY: O(1)

import type { Effect } from "effect";
import { Random } from "effect";

import type { Bounds } from "../core/models.js";

// nextIntBetween excludes its upper end.
export const drawSecret = (bounds: Bounds): Effect.Effect<number> =>
	Random.nextIntBetween(bounds.min, bounds.max + 1);
