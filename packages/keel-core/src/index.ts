export * as Eff from "./Eff.js"
export * as Scope from "./Scope.js"
export * as Handle from "./Handle.js"
export * as Handler from "./Handler.js"
export * as Runtime from "./Runtime.js"
export * as State from "./State.js"
export * as Exception from "./Exception.js"
export * as EarlyReturn from "./EarlyReturn.js"
export * as Jump from "./Jump.js"
export * as IO from "./IO.js"
export * as Compound from "./Compound.js"
export * as Coroutine from "./Coroutine.js"
export * as Stream from "./Stream.js"
export * as Debug from "./Debug.js"
export * as Errors from "./Errors.js"
export * as RuntimeConfig from "./RuntimeConfig.js"
export * as Env from "./Env.js"
