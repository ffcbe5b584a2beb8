/**
 * Config service: the decoded configuration as an Effect Context tag
 */

import { Context, Effect, Layer } from "effect"
import type { AppConfigType } from "./schema.js"
import { defaultConfig } from "./fromEnv.js"

/**
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const { server } = yield* Config
 *   yield* Effect.log(`clients connect to ${server.host}:${server.port}`)
 * })
 * ```
 */
export class Config extends Context.Tag("Config")<Config, AppConfigType>() {}

/** Config already decoded by the caller, e.g. from CLI flags */
export const ConfigFromValue = (value: AppConfigType) => Layer.succeed(Config, value)

type ConfigOverrides = { readonly [K in keyof AppConfigType]?: Partial<AppConfigType[K]> }

/** Defaults, with the given fields replaced section by section */
export const withOverrides = (overrides: ConfigOverrides): AppConfigType => {
  const base = defaultConfig()
  return {
    server: { ...base.server, ...overrides.server },
    connector: { ...base.connector, ...overrides.connector },
    ipc: { ...base.ipc, ...overrides.ipc },
    rpc: { ...base.rpc, ...overrides.rpc },
    scan: { ...base.scan, ...overrides.scan },
    log: { ...base.log, ...overrides.log },
    otel: { ...base.otel, ...overrides.otel },
  }
}

export const ConfigForTest = (overrides: ConfigOverrides = {}) =>
  Layer.sync(Config, () => withOverrides(overrides))

export const serverConfig = Config.pipe(Effect.map((c) => c.server))
export const connectorConfig = Config.pipe(Effect.map((c) => c.connector))
