import { Effect } from "effect"
import * as Handler from "./Handler.js"
import {
  guard,
  type Eff,
  type Handle,
  type ScopeBrand,
  type ScopeFrame,
} from "./internal/runtime/core/scope.js"

export type StateScope = ScopeBrand<"State">

/**
 * State:
 * - Any value with these two operations is a state handle; `focus` builds one
 *   that reads and writes part of another.
 */
export interface State<in out S, out E> extends Handle<E> {
  readonly get: Eff<S, E>
  readonly set: (value: S) => Eff<void, E>
}

const make = <S>(scope: ScopeFrame<StateScope>, cell: { value: S }): State<S, StateScope> => ({
  scope,
  get: guard(
    scope,
    Effect.sync(() => cell.value),
  ),
  set: (value) =>
    guard(
      scope,
      Effect.sync(() => {
        cell.value = value
      }),
    ),
})

export const get = <S, E>(state: State<S, E>): Eff<S, E> => state.get

export const set = <S, E>(state: State<S, E>, value: S): Eff<void, E> => state.set(value)

export const modify = <S, E>(state: State<S, E>, f: (current: S) => S): Eff<void, E> =>
  Effect.flatMap(state.get, (current) => state.set(f(current)))

/** Runs `body` with a fresh cell holding `initial`; returns the body's result and the final cell value. */
export const runState = <S, A, R>(
  initial: S,
  body: (state: State<S, StateScope>) => Eff<A, R>,
): Eff<readonly [A, S], Exclude<R, StateScope>> =>
  Effect.suspend(() => {
    const cell = { value: initial }
    return Handler.run<StateScope, A, S, R>({
      label: "State",
      use: (scope) => body(make(scope, cell)),
      finalize: () => cell.value,
    })
  })

export const evalState = <S, A, R>(
  initial: S,
  body: (state: State<S, StateScope>) => Eff<A, R>,
): Eff<A, Exclude<R, StateScope>> => Effect.map(runState(initial, body), ([result]) => result)

export interface Lens<S, T> {
  readonly get: (whole: S) => T
  readonly set: (whole: S, part: T) => S
}

/** A state handle over the part of `state` selected by `lens`, valid for as long as `state` is. */
export const focus = <S, T, E>(state: State<S, E>, lens: Lens<S, T>): State<T, E> => ({
  scope: state.scope,
  get: Effect.map(state.get, lens.get),
  set: (part) => modify(state, (whole) => lens.set(whole, part)),
})
