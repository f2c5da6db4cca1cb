import { Effect } from "effect"
import { guard, type Eff, type Handle, type ScopeBrand, type ScopeFrame } from "./scope.js"

export type IOScope = ScopeBrand<"IO">

export interface IOE<out E> extends Handle<E> {
  readonly run: <A>(thunk: () => A) => Eff<A, E>
  readonly runPromise: <A>(thunk: () => PromiseLike<A>) => Eff<A, E>
}

// Host failures are not Keel exceptions: both runners turn a throw or a
// rejection into a defect carrying the original error.
export const make = (scope: ScopeFrame<IOScope>): IOE<IOScope> => ({
  scope,
  run: (thunk) => guard(scope, Effect.sync(thunk)),
  runPromise: (thunk) => guard(scope, Effect.promise(thunk)),
})
