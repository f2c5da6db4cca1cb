import { Effect } from "effect"
import * as Coroutine from "./Coroutine.js"
import type { Eff } from "./internal/runtime/core/scope.js"

/** A coroutine that only produces. */
export type Stream<A, E> = Coroutine.Coroutine<A, void, E>

export type StreamHandle<A, R = never> = Stream<A, Coroutine.CoroutineScope | R>

const yield_ = <A, E>(stream: Stream<A, E>, value: A): Eff<void, E> => stream.yieldValue(value)

export { yield_ as yield }

export const forEach = <A, R, RB, RR>(
  body: (stream: StreamHandle<A, RR>) => Eff<R, RB>,
  each: (value: A) => Eff<void, RR>,
): Eff<R, Exclude<RB, Coroutine.CoroutineScope>> => Coroutine.forEach<A, void, R, RB, RR>(body, each)

/** Collects everything `body` yields, in order, next to its result. */
export const yieldToList = <A, R, RB>(
  body: (stream: StreamHandle<A>) => Eff<R, RB>,
): Eff<readonly [ReadonlyArray<A>, R], Exclude<RB, Coroutine.CoroutineScope>> =>
  Effect.suspend(() => {
    const items: Array<A> = []
    return Effect.map(
      forEach<A, R, RB, never>(body, (value) =>
        Effect.sync(() => {
          items.push(value)
        }),
      ),
      (result) => [items, result] as const,
    )
  })

export const fromIterable = <A, E>(stream: Stream<A, E>, values: Iterable<A>): Eff<void, E> =>
  Effect.forEach(values, (value) => yield_(stream, value), { discard: true })

/** Re-yields every element of `body` on `out`, paired with its position (from 0). */
export const enumerate = <A, R, RB, E>(
  body: (stream: StreamHandle<A, E>) => Eff<R, RB>,
  out: Stream<readonly [number, A], E>,
): Eff<R, Exclude<RB, Coroutine.CoroutineScope>> =>
  Effect.suspend(() => {
    let index = 0
    return forEach<A, R, RB, E>(body, (value) =>
      Effect.suspend(() => yield_(out, [index++, value] as const)),
    )
  })
