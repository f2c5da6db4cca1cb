import type { Effect } from "effect"
import { isOpen, type Handle } from "./internal/runtime/core/scope.js"

export type { Handle } from "./internal/runtime/core/scope.js"

/** True while the handler that created `handle` is active in the calling context. */
export const isUsable = <E>(handle: Handle<E>): Effect.Effect<boolean> => isOpen(handle.scope)
