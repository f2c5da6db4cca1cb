import { Effect, FiberRef, Layer } from "effect"
import type { ScopeInfo } from "./scope.js"
import type { ScopeViolationReason } from "./errors.js"
import type { CoroutineStatus } from "./coroutine.js"

export type Event =
  | {
      readonly type: "scope:open"
      readonly scope: ScopeInfo
      readonly depth: number
      readonly runtimeLabel?: string
    }
  | {
      readonly type: "scope:close"
      readonly scope: ScopeInfo
      readonly runtimeLabel?: string
    }
  | {
      readonly type: "scope:violation"
      readonly scope: ScopeInfo
      readonly reason: ScopeViolationReason
      readonly openScopes: ReadonlyArray<ScopeInfo>
      readonly runtimeLabel?: string
    }
  | {
      readonly type: "coroutine:resume"
      readonly scope: ScopeInfo
      readonly from: CoroutineStatus
      readonly runtimeLabel?: string
    }
  | {
      readonly type: "diagnostic"
      readonly code: string
      readonly severity: "error" | "warning" | "info"
      readonly message: string
      readonly hint?: string
      readonly runtimeLabel?: string
    }

export interface Sink {
  readonly record: (event: Event) => Effect.Effect<void>
}

export const currentDebugSinks = FiberRef.unsafeMake<ReadonlyArray<Sink>>([])
export const currentRuntimeLabel = FiberRef.unsafeMake<string | undefined>(undefined)
export const currentTraceScopes = FiberRef.unsafeMake<boolean>(false)

const describe = (scope: ScopeInfo): string => `${scope.label}#${scope.generation}`

const violationLog = (event: Extract<Event, { readonly type: "scope:violation" }>) =>
  Effect.logError(
    `[Keel] scope:violation ${describe(event.scope)} (${event.reason})`,
  ).pipe(
    Effect.annotateLogs({
      "keel.event": "scope:violation",
      "keel.scope": describe(event.scope),
      "keel.openScopes": event.openScopes.map(describe).join(","),
    }),
  )

const diagnosticLog = (event: Extract<Event, { readonly type: "diagnostic" }>) => {
  const msg = `[Keel] diagnostic(${event.severity}) code=${event.code} message=${event.message}${
    event.hint ? `\nhint: ${event.hint}` : ""
  }`
  const base =
    event.severity === "warning"
      ? Effect.logWarning(msg)
      : event.severity === "info"
        ? Effect.logInfo(msg)
        : Effect.logError(msg)
  const annotations: Record<string, unknown> = {
    "keel.event": `diagnostic(${event.severity})`,
    "keel.diagnostic.code": event.code,
  }
  if (event.hint) {
    annotations["keel.diagnostic.hint"] = event.hint
  }
  return base.pipe(Effect.annotateLogs(annotations))
}

/**
 * errorOnlySink:
 * - Default sink. Logs scope violations and non-info diagnostics, drops the rest.
 */
export const errorOnlySink: Sink = {
  record: (event) =>
    event.type === "scope:violation"
      ? violationLog(event)
      : event.type === "diagnostic" && event.severity !== "info"
        ? diagnosticLog(event)
        : Effect.void,
}

/**
 * consoleSink:
 * - Logs every event; scope traffic goes out at debug level.
 */
export const consoleSink: Sink = {
  record: (event) =>
    event.type === "scope:violation"
      ? violationLog(event)
      : event.type === "diagnostic"
        ? diagnosticLog(event)
        : Effect.logDebug({ debugEvent: event }).pipe(
            Effect.annotateLogs({ "keel.event": event.type }),
          ),
}

export interface MemorySink {
  readonly sink: Sink
  readonly events: () => ReadonlyArray<Event>
  readonly clear: () => void
}

export const makeMemorySink = (): MemorySink => {
  let buffer: Array<Event> = []
  return {
    sink: {
      record: (event) =>
        Effect.sync(() => {
          buffer.push(event)
        }),
    },
    events: () => buffer.slice(),
    clear: () => {
      buffer = []
    },
  }
}

export const noopLayer = Layer.locallyScoped(currentDebugSinks, [])
export const errorOnlyLayer = Layer.locallyScoped(currentDebugSinks, [errorOnlySink])
export const consoleLayer = Layer.locallyScoped(currentDebugSinks, [consoleSink])

export const withSinks =
  (sinks: ReadonlyArray<Sink>) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.locally(self, currentDebugSinks, sinks)

export const record = (event: Event): Effect.Effect<void> =>
  Effect.gen(function* () {
    const sinks = yield* FiberRef.get(currentDebugSinks)
    if (sinks.length === 0) {
      return
    }
    const runtimeLabel = yield* FiberRef.get(currentRuntimeLabel)
    const enriched: Event =
      runtimeLabel !== undefined && event.runtimeLabel === undefined
        ? { ...event, runtimeLabel }
        : event
    yield* Effect.forEach(sinks, (sink) => sink.record(enriched), { discard: true })
  })

// scope:open / scope:close / coroutine:resume are only emitted while tracing.
export const trace = (event: Event): Effect.Effect<void> =>
  Effect.flatMap(FiberRef.get(currentTraceScopes), (enabled) =>
    enabled ? record(event) : Effect.void,
  )
