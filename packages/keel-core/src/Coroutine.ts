import { Effect, type Either } from "effect"
import { makeDriver, type CoroutineStatus } from "./internal/runtime/core/coroutine.js"
import {
  guard,
  open,
  type Eff,
  type Handle,
  type ScopeBrand,
} from "./internal/runtime/core/scope.js"

export type { CoroutineStatus } from "./internal/runtime/core/coroutine.js"

export type CoroutineScope = ScopeBrand<"Coroutine">

/** Seen from the body: hand out an `Out`, get the next `In` back. */
export interface Coroutine<in Out, out In, out E> extends Handle<E> {
  readonly yieldValue: (value: Out) => Eff<In, E>
}

/** `R` adds the scopes the responder needs, for handles made by `forEach`. */
export type CoroutineHandle<Out, In, R = never> = Coroutine<Out, In, CoroutineScope | R>

/** Seen from the driver of a suspendable body. */
export interface Resumable<In, Out, R, E> extends Handle<E> {
  readonly resume: (input: In) => Eff<Either.Either<R, Out>, E>
  readonly status: Eff<CoroutineStatus, E>
}

const yield_ = <Out, In, E>(coroutine: Coroutine<Out, In, E>, value: Out): Eff<In, E> =>
  coroutine.yieldValue(value)

export { yield_ as yield }

/**
 * forEach:
 * - Runs `body`; each yielded value is answered by `respond`, in the body's
 *   own context, so nothing is suspended.
 */
export const forEach = <Out, In, R, RB, RR>(
  body: (coroutine: CoroutineHandle<Out, In, RR>) => Eff<R, RB>,
  respond: (value: Out) => Eff<In, RR>,
): Eff<R, Exclude<RB, CoroutineScope>> =>
  open<CoroutineScope, R, RB>("Coroutine", (scope) =>
    body({ scope, yieldValue: (value) => guard(scope, respond(value)) }),
  )

/**
 * withCoroutine:
 * - `body` does not start until the first `resume`, whose input it receives.
 * - Each `resume` runs the body up to its next yield (Left) or its end (Right).
 * - A body still suspended when `use` returns is interrupted; its cleanup runs
 *   before the scope closes.
 */
export const withCoroutine = <Out, In, R, RB, A, RU>(
  body: (coroutine: CoroutineHandle<Out, In>, input: In) => Eff<R, RB>,
  use: (resumable: Resumable<In, Out, R, CoroutineScope | RB>) => Eff<A, RU>,
): Eff<A, Exclude<RU, CoroutineScope>> =>
  open<CoroutineScope, A, RU>("Coroutine", (scope) => {
    const driver = makeDriver<Out, In, R, RB>(scope, (input) => body(coroutine, input))
    const coroutine: CoroutineHandle<Out, In> = {
      scope,
      yieldValue: (value) => guard(scope, driver.suspend(value)),
    }
    return Effect.ensuring(
      use({
        scope,
        resume: (input) => guard(scope, driver.resume(input)),
        status: guard(scope, driver.status),
      }),
      driver.stop,
    )
  })

export const resume = <In, Out, R, E>(
  resumable: Resumable<In, Out, R, E>,
  input: In,
): Eff<Either.Either<R, Out>, E> => resumable.resume(input)

export const status = <In, Out, R, E>(resumable: Resumable<In, Out, R, E>): Eff<CoroutineStatus, E> =>
  resumable.status
