export type { RuntimeConfig } from "./internal/runtime/core/config.js"
export { DEFAULT_CONFIG, fromEnv, resolve, withConfig } from "./internal/runtime/core/config.js"
