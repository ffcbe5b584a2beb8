/**
 * Environment variable parser using Effect Schema
 * Maps PRESENCE_* environment variables to typed configuration
 */

import { Effect, Option, Schema, ParseResult } from "effect"
import { AppConfig, type AppConfigType } from "./schema.js"

type Env = Readonly<Record<string, string | undefined>>

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

const LOG_LEVEL_ALIASES: Record<string, string> = {
  all: "All",
  trace: "Trace",
  debug: "Debug",
  info: "Info",
  warn: "Warning",
  warning: "Warning",
  error: "Error",
  fatal: "Fatal",
  none: "None",
  off: "None",
}

/** Case-insensitive; unknown names are passed on for the schema to reject */
const parseLogLevel = (value: string | undefined): string | undefined => {
  if (value === undefined) return undefined
  return LOG_LEVEL_ALIASES[value.toLowerCase().trim()] ?? value
}

const numberOf = (value: string | undefined) => Option.getOrUndefined(parseNumber(value))
const booleanOf = (value: string | undefined) => Option.getOrUndefined(parseBoolean(value))

// ============================================================================
// Main Decode Function
// ============================================================================

/** Raw config from environment (before schema validation) */
export const buildRawConfig = (env: Env = process.env) => ({
  server: {
    host: env.PRESENCE_HOST,
    port: numberOf(env.PRESENCE_PORT),
  },
  connector: {
    welcome: env.PRESENCE_WELCOME,
    failFast: booleanOf(env.PRESENCE_FAIL_FAST),
  },
  ipc: {
    enabled: booleanOf(env.PRESENCE_IPC),
  },
  rpc: {
    enabled: booleanOf(env.PRESENCE_RPC),
    portStart: numberOf(env.PRESENCE_RPC_PORT_START),
    portEnd: numberOf(env.PRESENCE_RPC_PORT_END),
  },
  scan: {
    enabled: booleanOf(env.PRESENCE_SCAN),
    pollMs: numberOf(env.PRESENCE_POLL_MS),
    detectablePath: env.PRESENCE_DETECTABLES || undefined,
  },
  log: {
    level: parseLogLevel(env.PRESENCE_LOG_LEVEL),
    format: env.PRESENCE_LOG_FORMAT?.toLowerCase().trim(),
  },
  otel: {
    enabled: booleanOf(env.PRESENCE_OTEL_ENABLED),
    serviceName: env.PRESENCE_OTEL_SERVICE_NAME || undefined,
    environment: env.PRESENCE_OTEL_ENV || env.NODE_ENV || undefined,
    endpoint: env.PRESENCE_OTEL_ENDPOINT?.trim() || undefined,
    sampleRatio: numberOf(env.PRESENCE_OTEL_SAMPLE_RATIO),
    metricIntervalMs: numberOf(env.PRESENCE_OTEL_METRIC_INTERVAL_MS),
    consoleFallback: booleanOf(env.PRESENCE_OTEL_CONSOLE_FALLBACK),
  },
})

/**
 * Decode configuration from environment variables
 * Fails with the schema's validation errors if a value is invalid
 */
export const decodeFromEnv = (
  env: Env = process.env
): Effect.Effect<AppConfigType, ParseResult.ParseError> =>
  Schema.decodeUnknown(AppConfig)(buildRawConfig(env))

/**
 * Synchronous config loading for use in non-Effect contexts
 * Throws on validation error
 */
export const loadConfigSync = (env: Env = process.env): AppConfigType =>
  Schema.decodeUnknownSync(AppConfig)(buildRawConfig(env))

/** All defaults, no environment */
export const defaultConfig = (): AppConfigType => Schema.decodeUnknownSync(AppConfig)({})

/** Human-readable validation failure */
export const formatConfigError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error)
