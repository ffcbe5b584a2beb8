/**
 * Configuration schema definitions using Effect Schema
 * This module provides type-safe, validated configuration with defaults
 */

import { Schema } from "effect"

// ============================================================================
// Primitive Config Types
// ============================================================================

/** Positive number schema */
const PositiveNumber = Schema.Number.pipe(
  Schema.positive(),
  Schema.annotations({ description: "Must be a positive number" })
)

/** Port number schema (0-65535, 0 = any free port) */
const PortNumber = Schema.Number.pipe(
  Schema.int(),
  Schema.between(0, 65535),
  Schema.annotations({ description: "Valid port number (0-65535)" })
)

export const LogLevelName = Schema.Literal(
  "All",
  "Trace",
  "Debug",
  "Info",
  "Warning",
  "Error",
  "Fatal",
  "None"
)

export const LogFormat = Schema.Literal("pretty", "logfmt", "json")

/** Empty presence record, sent to every client as it connects */
export const DEFAULT_WELCOME = JSON.stringify({ activity: null, pid: 0, socketId: "0" })

// ============================================================================
// Sections
// ============================================================================

/** Client-facing WebSocket and HTTP server */
export const ServerConfig = Schema.Struct({
  host: Schema.String.pipe(
    Schema.optionalWith({ default: () => "127.0.0.1" })
  ),

  port: PortNumber.pipe(
    Schema.optionalWith({ default: () => 1337 })
  ),
})

/** Dispatch behavior */
export const ConnectorConfig = Schema.Struct({
  /** Payload sent verbatim to each client on connect */
  welcome: Schema.String.pipe(
    Schema.optionalWith({ default: () => DEFAULT_WELCOME })
  ),

  /** Die on a message from an unregistered client instead of logging it */
  failFast: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false })
  ),
})

/** Local IPC socket producer */
export const IpcConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => true })
  ),
})

/** WebSocket command producer; binds the first free port in the range */
export const RpcConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => true })
  ),

  portStart: PortNumber.pipe(
    Schema.optionalWith({ default: () => 6463 })
  ),

  portEnd: PortNumber.pipe(
    Schema.optionalWith({ default: () => 6472 })
  ),
}).pipe(
  Schema.filter((rpc) => rpc.portStart <= rpc.portEnd || "portStart must not exceed portEnd")
)

/** Process watcher producer */
export const ScanConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => true })
  ),

  pollMs: PositiveNumber.pipe(
    Schema.optionalWith({ default: () => 5000 })
  ),

  /** Detectable list override; the bundled list is used when unset */
  detectablePath: Schema.String.pipe(Schema.optional),
})

export const LogConfig = Schema.Struct({
  level: LogLevelName.pipe(
    Schema.optionalWith({ default: () => "Info" as const })
  ),

  format: LogFormat.pipe(
    Schema.optionalWith({ default: () => "pretty" as const })
  ),
})

/** OpenTelemetry export; off unless enabled */
export const OtelConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false })
  ),

  serviceName: Schema.String.pipe(
    Schema.optionalWith({ default: () => "presence-bridge" })
  ),

  environment: Schema.String.pipe(
    Schema.optionalWith({ default: () => "development" })
  ),

  /** OTLP/HTTP base URL; without one, spans and metrics go to the console */
  endpoint: Schema.String.pipe(Schema.optional),

  sampleRatio: Schema.Number.pipe(
    Schema.between(0, 1),
    Schema.optionalWith({ default: () => 1 })
  ),

  metricIntervalMs: Schema.Number.pipe(
    Schema.greaterThanOrEqualTo(1000),
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
    Schema.optionalWith({ default: () => ({ host: "127.0.0.1", port: 1337 }) })
  ),
  connector: ConnectorConfig.pipe(
    Schema.optionalWith({ default: () => ({ welcome: DEFAULT_WELCOME, failFast: false }) })
  ),
  ipc: IpcConfig.pipe(
    Schema.optionalWith({ default: () => ({ enabled: true }) })
  ),
  rpc: RpcConfig.pipe(
    Schema.optionalWith({ default: () => ({ enabled: true, portStart: 6463, portEnd: 6472 }) })
  ),
  scan: ScanConfig.pipe(
    Schema.optionalWith({ default: () => ({ enabled: true, pollMs: 5000 }) })
  ),
  log: LogConfig.pipe(
    Schema.optionalWith({ default: () => ({ level: "Info" as const, format: "pretty" as const }) })
  ),
  otel: OtelConfig.pipe(
    Schema.optionalWith({
      default: () => ({
        enabled: false,
        serviceName: "presence-bridge",
        environment: "development",
        sampleRatio: 1,
        metricIntervalMs: 10000,
        consoleFallback: true,
      }),
    })
  ),
})

// ============================================================================
// Type Exports
// ============================================================================

export type AppConfigType = typeof AppConfig.Type
export type ServerConfigType = typeof ServerConfig.Type
export type ConnectorConfigType = typeof ConnectorConfig.Type
export type IpcConfigType = typeof IpcConfig.Type
export type RpcConfigType = typeof RpcConfig.Type
export type ScanConfigType = typeof ScanConfig.Type
export type LogConfigType = typeof LogConfig.Type
export type OtelConfigType = typeof OtelConfig.Type
export type LogLevelNameType = typeof LogLevelName.Type
export type LogFormatType = typeof LogFormat.Type
