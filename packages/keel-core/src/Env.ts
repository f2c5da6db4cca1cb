export { getNodeEnv, isDevEnv } from "./internal/runtime/core/env.js"
