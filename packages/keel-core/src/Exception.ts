import { Effect, Either } from "effect"
import type { Eff, Handle, ScopeBrand, ScopeFrame } from "./internal/runtime/core/scope.js"
import { catching, raise, type Channel } from "./internal/runtime/core/unwind.js"

export type ExceptionScope = ScopeBrand<"Exception">

export interface Exception<in X, out E> extends Handle<E> {
  readonly raise: (value: X) => Eff<never, E>
}

/** The handle `try` / `handle` / `catch` pass to their body. */
export type ExceptionHandle<X> = Exception<X, ExceptionScope>

const make = <X>(scope: ScopeFrame<ExceptionScope>, channel: Channel<X>): ExceptionHandle<X> => ({
  scope,
  raise: (value) => raise(scope, channel, value),
})

const throw_ = <X, E>(exception: Exception<X, E>, value: X): Eff<never, E> =>
  exception.raise(value)

/**
 * try:
 * - Left(x) when the body threw `x` on this handle, Right(a) otherwise.
 * - Throws on other Exception handles keep unwinding past this handler.
 */
const try_ = <X, A, R>(
  body: (exception: ExceptionHandle<X>) => Eff<A, R>,
): Eff<Either.Either<A, X>, Exclude<R, ExceptionScope>> =>
  catching<ExceptionScope, X, A, R>("Exception", (scope, channel) => body(make(scope, channel)))

export const handle = <X, A, R1, R2>(
  onThrow: (value: X) => Eff<A, R1>,
  body: (exception: ExceptionHandle<X>) => Eff<A, R2>,
): Eff<A, R1 | Exclude<R2, ExceptionScope>> =>
  Effect.flatMap(
    try_(body),
    Either.match({
      onLeft: onThrow,
      onRight: (a: A): Eff<A, R1> => Effect.succeed(a),
    }),
  )

const catch_ = <X, A, R1, R2>(
  body: (exception: ExceptionHandle<X>) => Eff<A, R2>,
  onThrow: (value: X) => Eff<A, R1>,
): Eff<A, R1 | Exclude<R2, ExceptionScope>> => handle(onThrow, body)

export { throw_ as throw, try_ as try, catch_ as catch }
