import { Effect } from "effect"
import type { Eff } from "./internal/runtime/core/scope.js"

export type { Eff } from "./internal/runtime/core/scope.js"
export type { Unwind } from "./internal/runtime/core/unwind.js"

/**
 * A cleanup step. It may use handles but cannot throw or return early:
 * an unwind already in flight must reach its handler.
 */
export type Cleanup<R = never> = Effect.Effect<void, never, R>

/**
 * bracket:
 * - `release` runs once `use` ends, whether it returned, threw on some
 *   Exception handle, or returned early.
 */
export const bracket = <Resource, A, R1, R2, R3>(
  acquire: Eff<Resource, R1>,
  release: (resource: Resource) => Cleanup<R2>,
  use: (resource: Resource) => Eff<A, R3>,
): Eff<A, R1 | R2 | R3> => Effect.acquireUseRelease(acquire, use, release)

const finally_ = <A, R1, R2>(self: Eff<A, R1>, cleanup: Cleanup<R2>): Eff<A, R1 | R2> =>
  Effect.ensuring(self, cleanup)

export { finally_ as finally }
