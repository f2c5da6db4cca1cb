import type { ScopeInfo } from "./scope.js"
import { isDevEnv } from "./env.js"

export type KeelErrorTag = "ScopeViolation" | "CoroutineProtocol" | "UnhandledUnwind"

/**
 * KeelError:
 * - Base of every contract violation raised by the runtime.
 * - Violations travel as defects (Effect.die), so these errors surface as
 *   thrown values from Runtime.runPure / rejected promises from Runtime.runEff.
 */
export abstract class KeelError extends Error {
  abstract readonly _tag: KeelErrorTag
  readonly hint?: string

  protected constructor(message: string, hint?: string) {
    super(message)
    this.hint = hint
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
      hint: this.hint,
    }
  }
}

export type ScopeViolationReason = "closed" | "not-in-scope"

const describe = (scope: ScopeInfo): string => `${scope.label}#${scope.generation}`

export class ScopeViolationError extends KeelError {
  readonly _tag = "ScopeViolation" as const
  override readonly name = "ScopeViolationError"
  readonly scope: ScopeInfo
  readonly reason: ScopeViolationReason
  readonly openScopes: ReadonlyArray<ScopeInfo>

  constructor(params: {
    readonly scope: ScopeInfo
    readonly reason: ScopeViolationReason
    readonly openScopes: ReadonlyArray<ScopeInfo>
  }) {
    const what =
      params.reason === "closed"
        ? `its handler has already returned`
        : `its handler is not active here`
    const listing = isDevEnv()
      ? `\nopen scopes: [${params.openScopes.map(describe).join(", ")}]`
      : ""
    super(
      `[Keel] handle of scope ${describe(params.scope)} used but ${what}${listing}`,
      "Handles are only valid inside the body of the handler that created them; do not return or store them.",
    )
    this.scope = params.scope
    this.reason = params.reason
    this.openScopes = params.openScopes
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      scope: this.scope,
      reason: this.reason,
      openScopes: this.openScopes,
    }
  }
}

export type CoroutineProtocolReason =
  | "resume-after-completion"
  | "reentrant-resume"
  | "yield-outside-resume"

const protocolMessages: Record<CoroutineProtocolReason, (scope: string) => string> = {
  "resume-after-completion": (scope) => `[Keel] coroutine ${scope} resumed after it completed`,
  "reentrant-resume": (scope) => `[Keel] coroutine ${scope} resumed from inside its own body`,
  "yield-outside-resume": (scope) => `[Keel] coroutine ${scope} yielded while no resume was waiting`,
}

const protocolHints: Record<CoroutineProtocolReason, string> = {
  "resume-after-completion": "Check the Right result of resume (or Coroutine.status) before resuming again.",
  "reentrant-resume": "A coroutine body cannot drive itself; yield to the driver instead.",
  "yield-outside-resume": "Yield only from the body fiber that resume is driving.",
}

export class CoroutineProtocolError extends KeelError {
  readonly _tag = "CoroutineProtocol" as const
  override readonly name = "CoroutineProtocolError"
  readonly scope: ScopeInfo
  readonly reason: CoroutineProtocolReason

  constructor(params: { readonly scope: ScopeInfo; readonly reason: CoroutineProtocolReason }) {
    super(protocolMessages[params.reason](describe(params.scope)), protocolHints[params.reason])
    this.scope = params.scope
    this.reason = params.reason
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), scope: this.scope, reason: this.reason }
  }
}

export class UnhandledUnwindError extends KeelError {
  readonly _tag = "UnhandledUnwind" as const
  override readonly name = "UnhandledUnwindError"
  readonly scope: ScopeInfo

  constructor(scope: ScopeInfo) {
    super(
      `[Keel] an exception raised on scope ${describe(scope)} reached the top level without its handler`,
    )
    this.scope = scope
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), scope: this.scope }
  }
}
