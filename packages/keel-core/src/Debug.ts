import * as Internal from "./internal/runtime/core/DebugSink.js"

// Debug events and sinks. Sinks live in a FiberRef, so they can be set per run
// (Runtime.RunOptions.sinks), per effect (withSinks) or per Layer.

export type Event = Internal.Event
export interface Sink extends Internal.Sink {}
export interface MemorySink extends Internal.MemorySink {}

export const internal = {
  currentDebugSinks: Internal.currentDebugSinks,
  currentRuntimeLabel: Internal.currentRuntimeLabel,
  currentTraceScopes: Internal.currentTraceScopes,
}

export const record = Internal.record
export const withSinks = Internal.withSinks

export const errorOnlySink: Sink = Internal.errorOnlySink
export const consoleSink: Sink = Internal.consoleSink
export const makeMemorySink = Internal.makeMemorySink

export const noopLayer = Internal.noopLayer
export const errorOnlyLayer = Internal.errorOnlyLayer
export const consoleLayer = Internal.consoleLayer
