/**
 * Environment variable parser using Effect Schema
 * Maps AUTH_KEY, CLOCKIFY_*, PORT and TRACKER_* variables to typed configuration
 */

import { Effect, Option, Schema, ParseResult } from "effect"
import {
  AppConfig,
  ObservabilityConfig,
  type AppConfigType,
  type ObservabilityConfigType,
} from "./schema.js"

type Env = Record<string, string | undefined>

// ============================================================================
// Environment Variable Parsers
// ============================================================================

/** Parse a string to number, returning None if invalid */
const parseNumber = (value: string | undefined): Option.Option<number> => {
  if (value === undefined || value.trim() === "") return Option.none()
  const parsed = Number(value)
  return Number.isFinite(parsed) ? Option.some(parsed) : Option.none()
}

/** Parse a boolean from various string representations */
const parseBoolean = (value: string | undefined): Option.Option<boolean> => {
  if (value === undefined) return Option.none()
  const normalized = value.toLowerCase().trim()
  if (normalized === "1" || normalized === "true" || normalized === "on") {
    return Option.some(true)
  }
  if (normalized === "0" || normalized === "false" || normalized === "off") {
    return Option.some(false)
  }
  return Option.none()
}

/** Blank strings count as unset so schema defaults apply */
const nonBlank = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === "" ? undefined : value.trim()

// ============================================================================
// Config Builders
// ============================================================================

const buildServerConfig = (env: Env) => ({
  host: nonBlank(env.HOST),
  port: Option.getOrUndefined(parseNumber(env.PORT)),
  readTimeoutMs: Option.getOrUndefined(parseNumber(env.TRACKER_READ_TIMEOUT_MS)),
  writeTimeoutMs: Option.getOrUndefined(parseNumber(env.TRACKER_WRITE_TIMEOUT_MS)),
  idleTimeoutMs: Option.getOrUndefined(parseNumber(env.TRACKER_IDLE_TIMEOUT_MS)),
  shutdownTimeoutMs: Option.getOrUndefined(parseNumber(env.TRACKER_SHUTDOWN_TIMEOUT_MS)),
})

const buildAuthConfig = (env: Env) => ({
  key: env.AUTH_KEY ?? "",
})

const buildClockifyConfig = (env: Env) => ({
  apiKey: env.CLOCKIFY_KEY ?? "",
  workspaceId: env.CLOCKIFY_WORKSPACE ?? "",
  projectId: env.CLOCKIFY_PROJECT ?? "",
  baseUrl: nonBlank(env.CLOCKIFY_BASE_URL)?.replace(/\/+$/, ""),
  timeoutMs: Option.getOrUndefined(parseNumber(env.CLOCKIFY_TIMEOUT_MS)),
})

const buildDebugConfig = (env: Env) => ({
  enabled: Option.getOrUndefined(parseBoolean(env.TRACKER_DEBUG)),
})

const buildObservabilityConfig = (env: Env) => ({
  enabled: Option.getOrUndefined(parseBoolean(env.TRACKER_OTEL_ENABLED)),
  serviceName: nonBlank(env.TRACKER_OTEL_SERVICE_NAME),
  serviceVersion: nonBlank(env.TRACKER_OTEL_VERSION),
  environment: nonBlank(env.TRACKER_OTEL_ENV) ?? nonBlank(env.NODE_ENV),
  otlpEndpoint: nonBlank(env.TRACKER_OTEL_ENDPOINT),
  sampleRatio: Option.getOrUndefined(parseNumber(env.TRACKER_OTEL_SAMPLE_RATIO)),
  metricIntervalMs: Option.getOrUndefined(parseNumber(env.TRACKER_OTEL_METRIC_INTERVAL_MS)),
  consoleFallback: Option.getOrUndefined(parseBoolean(env.TRACKER_OTEL_CONSOLE_FALLBACK)),
})

// ============================================================================
// Main Decode Function
// ============================================================================

/** Raw config from environment (before schema validation) */
const buildRawConfig = (env: Env) => ({
  server: buildServerConfig(env),
  auth: buildAuthConfig(env),
  clockify: buildClockifyConfig(env),
  debug: buildDebugConfig(env),
})

/**
 * Decode configuration from environment variables
 * Returns an Effect that fails with validation errors if config is invalid
 */
export const decodeFromEnv = (
  env: Env = process.env
): Effect.Effect<AppConfigType, ParseResult.ParseError> =>
  Schema.decode(AppConfig)(buildRawConfig(env))

/**
 * Synchronous config loading for use in non-Effect contexts
 * Throws a ParseError on validation failure
 */
export const loadConfigSync = (env: Env = process.env): AppConfigType =>
  Schema.decodeUnknownSync(AppConfig)(buildRawConfig(env))

/** Telemetry settings from TRACKER_OTEL_* variables */
export const loadObservabilityConfigSync = (
  env: Env = process.env
): ObservabilityConfigType =>
  Schema.decodeUnknownSync(ObservabilityConfig)(buildObservabilityConfig(env))

/** Human readable rendering of a config validation failure */
export const formatConfigError = (error: unknown): string =>
  ParseResult.isParseError(error)
    ? ParseResult.TreeFormatter.formatErrorSync(error)
    : error instanceof Error
      ? error.message
      : String(error)
