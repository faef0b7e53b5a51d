/**
 * Configuration module using Effect Schema
 *
 * Provides type-safe, validated configuration with defaults.
 * All environment variables are mapped to structured config objects.
 *
 * @example
 * ```ts
 * import { Config, ConfigLive } from "./config/index.js"
 *
 * const program = Effect.gen(function* () {
 *   const config = yield* Config
 *   console.log(`Server will start on ${config.server.host}:${config.server.port}`)
 * })
 *
 * // Run with live config from environment
 * const runnable = program.pipe(Effect.provide(ConfigLive))
 * ```
 */

// Types
export type {
  AppConfigType,
  ServerConfigType,
  ClockifyConfigType,
} from "./schema.js"

// Environment parsing
export {
  decodeFromEnv,
  loadConfigSync,
  formatConfigError,
} from "./fromEnv.js"

// Service and layer
export { Config, ConfigLive } from "./service.js"

export { parseListenAddr, formatListenAddr, type ListenAddress } from "./listenAddr.js"
