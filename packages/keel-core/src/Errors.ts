import { KeelError } from "./internal/runtime/core/errors.js"

export {
  KeelError,
  ScopeViolationError,
  CoroutineProtocolError,
  UnhandledUnwindError,
} from "./internal/runtime/core/errors.js"
export type {
  KeelErrorTag,
  ScopeViolationReason,
  CoroutineProtocolReason,
} from "./internal/runtime/core/errors.js"

export const isKeelError = (error: unknown): error is KeelError => error instanceof KeelError
