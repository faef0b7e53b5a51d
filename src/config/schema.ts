/**
 * Configuration schema definitions using Effect Schema
 * This module provides type-safe, validated configuration with defaults
 */

import { Schema } from "effect"

// ============================================================================
// Primitive Config Types
// ============================================================================

/** Port number schema (0-65535, 0 picks an ephemeral port) */
const PortNumber = Schema.Number.pipe(
  Schema.int(),
  Schema.between(0, 65535),
  Schema.annotations({ description: "Valid port number (0-65535)" })
)

/** Positive millisecond duration */
const Millis = Schema.Number.pipe(
  Schema.positive(),
  Schema.annotations({ description: "Must be a positive number of milliseconds" })
)

/** Required, non-empty secret or identifier */
const Required = (name: string) =>
  Schema.String.pipe(
    Schema.minLength(1, { message: () => `${name} must be set` })
  )

// ============================================================================
// Section Configs
// ============================================================================

/** HTTP server configuration */
export const ServerConfig = Schema.Struct({
  host: Schema.String.pipe(
    Schema.optionalWith({ default: () => "0.0.0.0" })
  ),

  port: PortNumber.pipe(
    Schema.optionalWith({ default: () => 8080 })
  ),

  /** Time allowed to receive a full request (ms) */
  readTimeoutMs: Millis.pipe(
    Schema.optionalWith({ default: () => 5000 })
  ),

  /** Socket inactivity allowed while writing a response (ms) */
  writeTimeoutMs: Millis.pipe(
    Schema.optionalWith({ default: () => 10000 })
  ),

  /** Keep-alive idle time (ms) */
  idleTimeoutMs: Millis.pipe(
    Schema.optionalWith({ default: () => 15000 })
  ),

  /** Drain budget for graceful shutdown (ms) */
  shutdownTimeoutMs: Millis.pipe(
    Schema.optionalWith({ default: () => 30000 })
  ),
})

/** Webhook authentication */
export const AuthConfig = Schema.Struct({
  key: Required("AUTH_KEY"),
})

/** Clockify upstream */
export const ClockifyConfig = Schema.Struct({
  apiKey: Required("CLOCKIFY_KEY"),
  workspaceId: Required("CLOCKIFY_WORKSPACE"),
  projectId: Required("CLOCKIFY_PROJECT"),

  baseUrl: Schema.String.pipe(
    Schema.optionalWith({ default: () => "https://api.clockify.me/api/v1" })
  ),

  timeoutMs: Millis.pipe(
    Schema.optionalWith({ default: () => 2000 })
  ),

  userAgent: Schema.String.pipe(
    Schema.optionalWith({ default: () => "auto-timetracker" })
  ),
})

/** Debug flags configuration */
export const DebugConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false })
  ),
})

/**
 * Telemetry export settings. Read on its own, at import time, since the
 * runtime that carries the exporters exists before the app config loads.
 */
export const ObservabilityConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false })
  ),

  serviceName: Schema.String.pipe(
    Schema.optionalWith({ default: () => "auto-timetracker" })
  ),

  serviceVersion: Schema.String.pipe(
    Schema.optionalWith({ default: () => "unknown" })
  ),

  environment: Schema.String.pipe(
    Schema.optionalWith({ default: () => "development" })
  ),

  /** OTLP/HTTP collector base URL; null falls back to console exporters */
  otlpEndpoint: Schema.NullOr(Schema.String).pipe(
    Schema.optionalWith({ default: () => null })
  ),

  /** Root span sampling ratio, clamped to 0..1 */
  sampleRatio: Schema.Number.pipe(
    Schema.clamp(0, 1),
    Schema.optionalWith({ default: () => 1 })
  ),

  /** Metric export interval (ms), at least one second */
  metricIntervalMs: Schema.Number.pipe(
    Schema.clamp(1000, Number.MAX_SAFE_INTEGER),
    Schema.optionalWith({ default: () => 10000 })
  ),

  consoleFallback: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => true })
  ),
})

// ============================================================================
// Main Application Config
// ============================================================================

/** Complete application configuration */
export const AppConfig = Schema.Struct({
  server: ServerConfig.pipe(
    Schema.optionalWith({
      default: () => ({
        host: "0.0.0.0",
        port: 8080,
        readTimeoutMs: 5000,
        writeTimeoutMs: 10000,
        idleTimeoutMs: 15000,
        shutdownTimeoutMs: 30000,
      }),
    })
  ),
  auth: AuthConfig,
  clockify: ClockifyConfig,
  debug: DebugConfig.pipe(
    Schema.optionalWith({ default: () => ({ enabled: false }) })
  ),
})

// ============================================================================
// Type Exports
// ============================================================================

export type AppConfigType = typeof AppConfig.Type
export type ServerConfigType = typeof ServerConfig.Type
export type ClockifyConfigType = typeof ClockifyConfig.Type
export type ObservabilityConfigType = typeof ObservabilityConfig.Type
