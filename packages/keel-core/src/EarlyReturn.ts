import { Effect, Either } from "effect"
import type { Eff, Handle, ScopeBrand } from "./internal/runtime/core/scope.js"
import { catching, raise } from "./internal/runtime/core/unwind.js"

export type EarlyReturnScope = ScopeBrand<"EarlyReturn">

export interface EarlyReturn<in A, out E> extends Handle<E> {
  readonly returnWith: (value: A) => Eff<never, E>
}

export type EarlyReturnHandle<A> = EarlyReturn<A, EarlyReturnScope>

/** Leaves the enclosing `withEarlyReturn` at once, making `value` its result. */
export const returnEarly = <A, E>(ret: EarlyReturn<A, E>, value: A): Eff<never, E> =>
  ret.returnWith(value)

export const withEarlyReturn = <A, R>(
  body: (ret: EarlyReturnHandle<A>) => Eff<A, R>,
): Eff<A, Exclude<R, EarlyReturnScope>> =>
  Effect.map(
    catching<EarlyReturnScope, A, A, R>("EarlyReturn", (scope, channel) =>
      body({ scope, returnWith: (value) => raise(scope, channel, value) }),
    ),
    Either.merge,
  )
