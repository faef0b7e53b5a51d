/**
 * Config service for dependency injection using Effect Context
 */

import { Context, Layer } from "effect"
import type { AppConfigType } from "./schema.js"
import { decodeFromEnv } from "./fromEnv.js"

// ============================================================================
// Service Tag
// ============================================================================

/**
 * Tag for the Config service
 * Use this to access configuration in Effect programs
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const config = yield* Config
 *   yield* Effect.log(`Server port: ${config.server.port}`)
 * })
 * ```
 */
export class Config extends Context.Tag("Config")<Config, AppConfigType>() {}

// ============================================================================
// Layer Implementations
// ============================================================================

/**
 * Layer that loads config from environment variables
 * Fails with the schema ParseError when a required variable is missing
 */
export const ConfigLive = Layer.effect(Config, decodeFromEnv())
