import type { Eff } from "./internal/runtime/core/scope.js"
import type { IOE } from "./internal/runtime/core/io.js"

export type { IOE, IOScope } from "./internal/runtime/core/io.js"

/** Runs a synchronous host action. */
export const effIO = <A, E>(io: IOE<E>, thunk: () => A): Eff<A, E> => io.run(thunk)

/** Awaits a host action; a rejection rejects the surrounding `Runtime.runEff`. */
export const effPromise = <A, E>(io: IOE<E>, thunk: () => PromiseLike<A>): Eff<A, E> =>
  io.runPromise(thunk)
