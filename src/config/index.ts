/**
 * Configuration module using Effect Schema
 *
 * Provides type-safe, validated configuration with defaults.
 * All PRESENCE_* environment variables are mapped to structured config objects.
 *
 * @example
 * ```ts
 * import { Config, ConfigFromValue, loadConfigSync } from "./config/index.js"
 *
 * const program = Effect.gen(function* () {
 *   const config = yield* Config
 *   yield* Effect.log(`Bridge will listen on ${config.server.host}:${config.server.port}`)
 * })
 *
 * const runnable = program.pipe(Effect.provide(ConfigFromValue(loadConfigSync())))
 * ```
 */

// Schema definitions and types
export {
  AppConfig,
  ServerConfig,
  ConnectorConfig,
  IpcConfig,
  RpcConfig,
  ScanConfig,
  LogConfig,
  OtelConfig,
  LogLevelName,
  LogFormat,
  DEFAULT_WELCOME,
  type AppConfigType,
  type ServerConfigType,
  type ConnectorConfigType,
  type IpcConfigType,
  type RpcConfigType,
  type ScanConfigType,
  type LogConfigType,
  type OtelConfigType,
  type LogLevelNameType,
  type LogFormatType,
} from "./schema.js"

// Environment parsing
export {
  buildRawConfig,
  decodeFromEnv,
  loadConfigSync,
  defaultConfig,
  formatConfigError,
} from "./fromEnv.js"

// Service and layers
export {
  Config,
  ConfigFromValue,
  ConfigForTest,
  withOverrides,
  serverConfig,
  connectorConfig,
} from "./service.js"
