export type {
  Eff,
  ScopeBrand,
  ScopeFrame,
  ScopeInfo,
  ScopeStatus,
} from "./internal/runtime/core/scope.js"
export {
  ScopeTypeId,
  open,
  guard,
  isOpen,
  current,
} from "./internal/runtime/core/scope.js"
