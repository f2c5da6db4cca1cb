import { Context, Effect, FiberRef, Option } from "effect"
import type { Types } from "effect"
import * as Debug from "./DebugSink.js"
import { ScopeViolationError, type ScopeViolationReason } from "./errors.js"
import type { Unwind } from "./unwind.js"

export type Eff<A, R = never> = Effect.Effect<A, Unwind, R>

export const ScopeTypeId: unique symbol = Symbol.for("keel/Scope")
export type ScopeTypeId = typeof ScopeTypeId

/**
 * ScopeBrand:
 * - Type-level tag of one handler kind, carried in the requirements channel.
 * - A handler removes its brand from the set it returns, so a computation that
 *   still names a brand is not under a handler of that kind.
 */
export interface ScopeBrand<out K extends string> {
  readonly [ScopeTypeId]: K
}

export interface ScopeInfo {
  readonly generation: number
  readonly label: string
}

export type ScopeStatus = "open" | "closed"

export interface ScopeFrame<out E> extends ScopeInfo {
  readonly [ScopeTypeId]: { readonly _E: Types.Covariant<E> }
  readonly key: string
  readonly status: ScopeStatus
}

/** Shape shared by every capability handle: the frame of the handler that made it. */
export interface Handle<out E> {
  readonly scope: ScopeFrame<E>
}

interface MutableFrame<E> extends ScopeFrame<E> {
  status: ScopeStatus
}

let nextGeneration = 1

const variance = { _E: (_: never) => _ }

const mint = <E>(label: string): MutableFrame<E> => {
  const generation = nextGeneration++
  return {
    [ScopeTypeId]: variance,
    generation,
    label,
    key: `keel/Scope/${label}#${generation}`,
    status: "open",
  }
}

export const toInfo = (frame: ScopeInfo): ScopeInfo => ({
  generation: frame.generation,
  label: frame.label,
})

const tagFor = <E>(key: string) => Context.GenericTag<E, ScopeInfo>(key)

/** Open frames of the current fiber, outermost first. */
export const currentScopes = FiberRef.unsafeMake<ReadonlyArray<ScopeInfo>>([])

export const current: Effect.Effect<ReadonlyArray<ScopeInfo>> = FiberRef.get(currentScopes)

/**
 * open:
 * - Mints a frame, makes it visible to guards for the extent of body, and
 *   closes it on every exit.
 * - The frame is provided under its own key, so two frames of one brand never
 *   satisfy each other's guards.
 */
export const open = <Brand, A, R>(
  label: string,
  body: (frame: ScopeFrame<Brand>) => Eff<A, R>,
): Eff<A, Exclude<R, Brand>> =>
  Effect.suspend(() => {
    const frame = mint<Brand>(label)
    const info = toInfo(frame)
    const close = Effect.suspend(() => {
      frame.status = "closed"
      return Debug.trace({ type: "scope:close", scope: info })
    })
    return Effect.flatMap(FiberRef.get(currentScopes), (stack) =>
      Debug.trace({ type: "scope:open", scope: info, depth: stack.length }).pipe(
        Effect.zipRight(body(frame)),
        Effect.provideService(tagFor<Brand>(frame.key), frame),
        Effect.locally(currentScopes, [...stack, info]),
        Effect.ensuring(close),
      ),
    )
  })

const found = <E>(context: Context.Context<E>, frame: ScopeFrame<E>): boolean => {
  const entry = Context.getOption(context, tagFor<E>(frame.key))
  return frame.status === "open" && Option.isSome(entry) && entry.value === frame
}

const violation = (frame: ScopeInfo, reason: ScopeViolationReason): Effect.Effect<never> =>
  Effect.flatMap(FiberRef.get(currentScopes), (openScopes) => {
    const scope = toInfo(frame)
    return Debug.record({ type: "scope:violation", scope, reason, openScopes }).pipe(
      Effect.zipRight(Effect.die(new ScopeViolationError({ scope, reason, openScopes }))),
    )
  })

/**
 * guard:
 * - Runs effect only while frame is open and active in the calling context;
 *   dies with ScopeViolationError otherwise.
 */
export const guard = <E, A, R>(frame: ScopeFrame<E>, effect: Eff<A, R>): Eff<A, E | R> =>
  Effect.contextWithEffect((context: Context.Context<E>): Eff<A, R> =>
    found(context, frame)
      ? effect
      : violation(frame, frame.status === "closed" ? "closed" : "not-in-scope"),
  )

export const isOpen = <E>(frame: ScopeFrame<E>): Effect.Effect<boolean> =>
  Effect.contextWith((context: Context.Context<never>) => {
    const entry = Context.getOption(context, tagFor<never>(frame.key))
    return frame.status === "open" && Option.isSome(entry) && entry.value === frame
  })
