import { Config, Effect, Option } from "effect"
import { currentRuntimeLabel, currentTraceScopes } from "./DebugSink.js"

export interface RuntimeConfig {
  /** Emit scope:open / scope:close / coroutine:resume debug events. */
  readonly traceScopes: boolean
  /** Attached to every debug event as runtimeLabel. */
  readonly label: string | undefined
}

export const DEFAULT_CONFIG: RuntimeConfig = {
  traceScopes: false,
  label: undefined,
}

const envConfig = Config.all({
  traceScopes: Config.boolean("KEEL_TRACE_SCOPES").pipe(Config.withDefault(false)),
  label: Config.option(Config.string("KEEL_RUNTIME_LABEL")),
})

/**
 * fromEnv:
 * - Reads KEEL_TRACE_SCOPES / KEEL_RUNTIME_LABEL from the current ConfigProvider.
 * - Malformed values fall back to DEFAULT_CONFIG as a whole and leave a warning in the log.
 */
export const fromEnv: Effect.Effect<RuntimeConfig> = Effect.gen(function* () {
  const raw = yield* envConfig
  return { traceScopes: raw.traceScopes, label: Option.getOrUndefined(raw.label) }
}).pipe(
  Effect.catchAll((error) =>
    Effect.logWarning(`[Keel] invalid runtime config, using defaults: ${String(error)}`).pipe(
      Effect.as(DEFAULT_CONFIG),
    ),
  ),
)

export const resolve = (override?: Partial<RuntimeConfig>): Effect.Effect<RuntimeConfig> =>
  Effect.map(fromEnv, (base) => ({ ...base, ...override }))

export const withConfig =
  (config: Partial<RuntimeConfig>) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> => {
    let out = self
    if (config.traceScopes !== undefined) {
      out = Effect.locally(out, currentTraceScopes, config.traceScopes)
    }
    if (config.label !== undefined) {
      out = Effect.locally(out, currentRuntimeLabel, config.label)
    }
    return out
  }
