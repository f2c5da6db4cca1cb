import { Data, Effect, Either, Option } from "effect"
import { guard, open, type Eff, type ScopeFrame, type ScopeInfo } from "./scope.js"

/**
 * Unwind:
 * - The only failure in an Eff error channel.
 * - Carries the identity of the handler it unwinds to; the payload stays in
 *   the owning handler's channel so each handler reads back its own type.
 */
export class Unwind extends Data.TaggedError("Unwind")<{
  readonly generation: number
  readonly label: string
}> {}

export interface Channel<X> {
  readonly unwind: (value: X) => Unwind
  readonly claim: (unwind: Unwind) => Option.Option<X>
}

export const makeChannel = <X>(scope: ScopeInfo): Channel<X> => {
  const payloads = new WeakMap<Unwind, { readonly value: X }>()
  return {
    unwind: (value) => {
      const unwind = new Unwind({ generation: scope.generation, label: scope.label })
      payloads.set(unwind, { value })
      return unwind
    },
    claim: (unwind) => {
      const box = payloads.get(unwind)
      return box === undefined ? Option.none() : Option.some(box.value)
    },
  }
}

/** Fails with an unwind addressed to `channel`'s handler, if `scope` is usable here. */
export const raise = <E, X>(scope: ScopeFrame<E>, channel: Channel<X>, value: X): Eff<never, E> =>
  guard(scope, Effect.suspend(() => Effect.fail(channel.unwind(value))))

/**
 * catching:
 * - Opens a scope whose body may unwind to it through a fresh channel.
 * - Unwinds addressed to other handlers pass through untouched.
 */
export const catching = <Brand, X, A, R>(
  label: string,
  body: (scope: ScopeFrame<Brand>, channel: Channel<X>) => Eff<A, R>,
): Eff<Either.Either<A, X>, Exclude<R, Brand>> =>
  open<Brand, Either.Either<A, X>, R>(label, (scope) => {
    const channel = makeChannel<X>(scope)
    return body(scope, channel).pipe(
      Effect.map((a): Either.Either<A, X> => Either.right(a)),
      Effect.catchAll((unwind): Eff<Either.Either<A, X>> =>
        Option.match(channel.claim(unwind), {
          onNone: () => Effect.fail(unwind),
          onSome: (value) => Effect.succeed(Either.left(value)),
        }),
      ),
    )
  })
