import { Cause, Effect, Exit, Option } from "effect"
import * as Config from "./internal/runtime/core/config.js"
import * as DebugSink from "./internal/runtime/core/DebugSink.js"
import { UnhandledUnwindError } from "./internal/runtime/core/errors.js"
import * as IO from "./internal/runtime/core/io.js"
import { currentScopes, open, toInfo, type Eff } from "./internal/runtime/core/scope.js"
import type { Unwind } from "./internal/runtime/core/unwind.js"

export interface RunOptions {
  /** Takes precedence over KEEL_TRACE_SCOPES / KEEL_RUNTIME_LABEL. */
  readonly config?: Partial<Config.RuntimeConfig>
  /** Replaces the default error-only sink. */
  readonly sinks?: ReadonlyArray<DebugSink.Sink>
}

const prepare = <A, R>(self: Eff<A, R>, options?: RunOptions): Eff<A, R> =>
  Effect.flatMap(Config.resolve(options?.config), (config) =>
    self.pipe(
      Config.withConfig(config),
      DebugSink.withSinks(options?.sinks ?? [DebugSink.errorOnlySink]),
      Effect.locally(currentScopes, []),
    ),
  )

const squash = (cause: Cause.Cause<Unwind>): unknown =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => Cause.squash(cause),
    onSome: (unwind) => new UnhandledUnwindError(toInfo(unwind)),
  })

/**
 * runPure:
 * - Only accepts computations with no open scopes left, and runs them synchronously.
 * - The type is the check at this boundary. A computation forced past it still
 *   cannot use a handle without a live frame: every operation passes through
 *   Scope.guard, which raises ScopeViolationError there.
 * - Contract violations are thrown as the corresponding Keel error; other
 *   defects are thrown as they were raised.
 */
export const runPure = <A>(self: Eff<A>, options?: RunOptions): A => {
  const exit = Effect.runSyncExit(prepare(self, options))
  if (Exit.isSuccess(exit)) {
    return exit.value
  }
  throw squash(exit.cause)
}

/**
 * runEff:
 * - Grants host I/O: mints the single IO scope of this run and hands its
 *   handle to `body`.
 * - Rejects with the same errors runPure would throw; a failed host action
 *   rejects with its own error.
 */
export const runEff = <A>(
  body: (io: IO.IOE<IO.IOScope>) => Eff<A, IO.IOScope>,
  options?: RunOptions,
): Promise<A> =>
  Effect.runPromiseExit(
    prepare(
      open<IO.IOScope, A, IO.IOScope>("IO", (scope) => body(IO.make(scope))),
      options,
    ),
  ).then((exit) => {
    if (Exit.isSuccess(exit)) {
      return exit.value
    }
    throw squash(exit.cause)
  })
