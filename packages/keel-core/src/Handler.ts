import { Effect } from "effect"
import { open, type Eff, type ScopeFrame } from "./internal/runtime/core/scope.js"

export interface HandlerOptions<Brand, A, F, R> {
  /** Appears in scope keys, debug events and violation messages. */
  readonly label: string
  /** Builds the handle on `scope` and runs the body with it. */
  readonly use: (scope: ScopeFrame<Brand>) => Eff<A, R>
  /** Reads the handler's final storage once the body has returned normally. */
  readonly finalize: (result: A) => F
  /** Runs on every exit, before the scope closes. */
  readonly release?: Effect.Effect<void>
}

/**
 * run:
 * - The generic handler protocol: mint a scope, build the handle, run the
 *   body, finalize, close the scope.
 * - The scope is closed by the time the result is available, so any handle
 *   that escaped through the result is already unusable.
 */
export const run = <Brand, A, F, R>(
  options: HandlerOptions<Brand, A, F, R>,
): Eff<readonly [A, F], Exclude<R, Brand>> =>
  open<Brand, readonly [A, F], R>(options.label, (scope) =>
    options.use(scope).pipe(
      Effect.map((result) => [result, options.finalize(result)] as const),
      Effect.ensuring(options.release ?? Effect.void),
    ),
  )
