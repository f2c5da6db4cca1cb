import { Deferred, Effect, Either, Exit, Fiber } from "effect"
import * as Debug from "./DebugSink.js"
import { CoroutineProtocolError, type CoroutineProtocolReason } from "./errors.js"
import { toInfo, type Eff, type ScopeInfo } from "./scope.js"
import type { Unwind } from "./unwind.js"

export type CoroutineStatus = "idle" | "suspended" | "running" | "completed"

type DriverState<Out, In, R> =
  | { readonly _tag: "Idle" }
  | {
      readonly _tag: "Running"
      readonly outbox: Deferred.Deferred<Either.Either<R, Out>, Unwind>
    }
  | { readonly _tag: "Suspended"; readonly reply: Deferred.Deferred<In> }
  | { readonly _tag: "Completed" }

const statusOf = <Out, In, R>(state: DriverState<Out, In, R>): CoroutineStatus => {
  switch (state._tag) {
    case "Idle":
      return "idle"
    case "Running":
      return "running"
    case "Suspended":
      return "suspended"
    case "Completed":
      return "completed"
  }
}

export interface Driver<Out, In, R, RB> {
  /** Called by the body: hands `value` to the waiting resume and parks until the next one. */
  readonly suspend: (value: Out) => Effect.Effect<In>
  readonly resume: (input: In) => Eff<Either.Either<R, Out>, RB>
  readonly status: Effect.Effect<CoroutineStatus>
  /** Interrupts a body that has not completed. */
  readonly stop: Effect.Effect<void>
}

/**
 * makeDriver:
 * - The body runs on its own fiber, started by the first resume.
 * - resume and suspend hand control back and forth through two Deferreds, so
 *   exactly one side runs at a time.
 * - Whatever the body ends with (value, unwind or defect) is delivered to the
 *   resume that is waiting at that moment.
 * - Interrupting a waiting resume stops the body; the coroutine is completed.
 */
export const makeDriver = <Out, In, R, RB>(
  scope: ScopeInfo,
  run: (input: In) => Eff<R, RB>,
): Driver<Out, In, R, RB> => {
  const info = toInfo(scope)
  let state: DriverState<Out, In, R> = { _tag: "Idle" }
  let fiber: Fiber.RuntimeFiber<void> | undefined

  const protocolError = (reason: CoroutineProtocolReason): Effect.Effect<never> =>
    Effect.die(new CoroutineProtocolError({ scope: info, reason }))

  const start = (input: In): Effect.Effect<void, never, RB> =>
    Effect.flatMap(Effect.exit(run(input)), (exit) =>
      Effect.suspend(() => {
        const current = state
        state = { _tag: "Completed" }
        if (current._tag !== "Running") {
          return Effect.void
        }
        return Effect.asVoid(
          Exit.isSuccess(exit)
            ? Deferred.succeed(current.outbox, Either.right(exit.value))
            : Deferred.failCause(current.outbox, exit.cause),
        )
      }),
    )

  const resume = (input: In): Eff<Either.Either<R, Out>, RB> =>
    Effect.suspend((): Eff<Either.Either<R, Out>, RB> => {
      const current = state
      if (current._tag === "Completed") {
        return protocolError("resume-after-completion")
      }
      if (current._tag === "Running") {
        return protocolError("reentrant-resume")
      }
      return Effect.uninterruptibleMask((restore) =>
        Effect.gen(function* () {
          yield* Debug.trace({ type: "coroutine:resume", scope: info, from: statusOf(current) })
          const outbox = yield* Deferred.make<Either.Either<R, Out>, Unwind>()
          state = { _tag: "Running", outbox }
          if (current._tag === "Suspended") {
            yield* Deferred.succeed(current.reply, input)
          } else {
            // daemon: the body outlives the fiber of the first resume; stop ends it
            fiber = yield* Effect.forkDaemon(Effect.interruptible(start(input)))
          }
          return yield* restore(Deferred.await(outbox)).pipe(Effect.onInterrupt(() => stop))
        }),
      )
    })

  const suspend = (value: Out): Effect.Effect<In> =>
    Effect.suspend((): Effect.Effect<In> => {
      const current = state
      if (current._tag !== "Running") {
        return protocolError("yield-outside-resume")
      }
      return Effect.gen(function* () {
        const reply = yield* Deferred.make<In>()
        state = { _tag: "Suspended", reply }
        yield* Deferred.succeed(current.outbox, Either.left(value))
        return yield* Deferred.await(reply)
      })
    })

  const stop = Effect.suspend(() => {
    const running = fiber
    const finished = state._tag === "Completed"
    state = { _tag: "Completed" }
    return running === undefined || finished ? Effect.void : Fiber.interrupt(running).pipe(Effect.asVoid)
  })

  return {
    suspend,
    resume,
    status: Effect.sync(() => statusOf(state)),
    stop,
  }
}
