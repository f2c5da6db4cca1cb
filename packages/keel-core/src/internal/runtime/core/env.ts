// Read at call time so bundlers cannot inline NODE_ENV.
export const getNodeEnv = (): string | undefined => {
  const env = globalThis.process?.env
  return typeof env?.NODE_ENV === "string" ? env.NODE_ENV : undefined
}

export const isDevEnv = (): boolean => getNodeEnv() !== "production"
