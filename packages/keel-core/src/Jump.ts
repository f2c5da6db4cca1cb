import { Effect } from "effect"
import type { Eff, Handle, ScopeBrand } from "./internal/runtime/core/scope.js"
import { catching, raise } from "./internal/runtime/core/unwind.js"

export type JumpScope = ScopeBrand<"Jump">

export interface Jump<out E> extends Handle<E> {
  readonly jump: Eff<never, E>
}

/** Resumes right after the `withJump` that made `jump`. */
export const jumpTo = <E>(jump: Jump<E>): Eff<never, E> => jump.jump

export const withJump = <R>(body: (jump: Jump<JumpScope>) => Eff<void, R>): Eff<void, Exclude<R, JumpScope>> =>
  Effect.asVoid(
    catching<JumpScope, void, void, R>("Jump", (scope, channel) =>
      body({ scope, jump: raise(scope, channel, undefined) }),
    ),
  )
