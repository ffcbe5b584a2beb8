/**
 * Tests for PRESENCE_* environment parsing and the Config service
 */

import { describe, it } from "node:test"
import assert from "node:assert"
import { Effect, Either } from "effect"
import {
  Config,
  ConfigForTest,
  DEFAULT_WELCOME,
  decodeFromEnv,
  defaultConfig,
  formatConfigError,
  connectorConfig,
  loadConfigSync,
  serverConfig,
  withOverrides,
} from "../../src/config/index.js"

const decode = (env: Record<string, string>) =>
  Effect.runSync(Effect.either(decodeFromEnv(env)))

describe("defaults", () => {
  it("fills every section when the environment is empty", () => {
    const config = defaultConfig()
    assert.deepStrictEqual(config.server, { host: "127.0.0.1", port: 1337 })
    assert.deepStrictEqual(config.connector, { welcome: DEFAULT_WELCOME, failFast: false })
    assert.strictEqual(config.ipc.enabled, true)
    assert.deepStrictEqual(config.rpc, { enabled: true, portStart: 6463, portEnd: 6472 })
    assert.strictEqual(config.scan.enabled, true)
    assert.strictEqual(config.scan.pollMs, 5000)
    assert.strictEqual(config.scan.detectablePath, undefined)
    assert.deepStrictEqual(config.log, { level: "Info", format: "pretty" })
    assert.strictEqual(config.otel.enabled, false)
    assert.strictEqual(config.otel.endpoint, undefined)
  })

  it("uses the empty presence record as the welcome payload", () => {
    assert.strictEqual(DEFAULT_WELCOME, '{"activity":null,"pid":0,"socketId":"0"}')
  })
})

describe("environment overrides", () => {
  it("reads server, connector and producer settings", () => {
    const config = loadConfigSync({
      PRESENCE_HOST: "0.0.0.0",
      PRESENCE_PORT: "4000",
      PRESENCE_WELCOME: "hello",
      PRESENCE_FAIL_FAST: "true",
      PRESENCE_IPC: "0",
      PRESENCE_RPC: "off",
      PRESENCE_RPC_PORT_START: "7000",
      PRESENCE_RPC_PORT_END: "7001",
      PRESENCE_SCAN: "false",
      PRESENCE_POLL_MS: "250",
      PRESENCE_DETECTABLES: "/etc/presence/games.json",
    })
    assert.deepStrictEqual(config.server, { host: "0.0.0.0", port: 4000 })
    assert.deepStrictEqual(config.connector, { welcome: "hello", failFast: true })
    assert.strictEqual(config.ipc.enabled, false)
    assert.deepStrictEqual(config.rpc, { enabled: false, portStart: 7000, portEnd: 7001 })
    assert.strictEqual(config.scan.enabled, false)
    assert.strictEqual(config.scan.pollMs, 250)
    assert.strictEqual(config.scan.detectablePath, "/etc/presence/games.json")
  })

  it("maps log level aliases case-insensitively", () => {
    assert.strictEqual(loadConfigSync({ PRESENCE_LOG_LEVEL: "WARN" }).log.level, "Warning")
    assert.strictEqual(loadConfigSync({ PRESENCE_LOG_LEVEL: "off" }).log.level, "None")
    assert.strictEqual(loadConfigSync({ PRESENCE_LOG_LEVEL: "debug" }).log.level, "Debug")
  })

  it("reads telemetry settings, falling back to NODE_ENV", () => {
    const config = loadConfigSync({
      PRESENCE_OTEL_ENABLED: "1",
      PRESENCE_OTEL_ENDPOINT: " http://127.0.0.1:4318/ ",
      PRESENCE_OTEL_SAMPLE_RATIO: "0.25",
      NODE_ENV: "test",
    })
    assert.deepStrictEqual(config.otel, {
      enabled: true,
      serviceName: "presence-bridge",
      environment: "test",
      endpoint: "http://127.0.0.1:4318/",
      sampleRatio: 0.25,
      metricIntervalMs: 10000,
      consoleFallback: true,
    })
  })

  it("lowercases the log format", () => {
    assert.strictEqual(loadConfigSync({ PRESENCE_LOG_FORMAT: "JSON" }).log.format, "json")
  })

  it("ignores unparseable numbers and booleans", () => {
    const config = loadConfigSync({ PRESENCE_PORT: "abc", PRESENCE_IPC: "maybe" })
    assert.strictEqual(config.server.port, 1337)
    assert.strictEqual(config.ipc.enabled, true)
  })
})

describe("validation", () => {
  it("rejects an unknown log format", () => {
    assert.ok(Either.isLeft(decode({ PRESENCE_LOG_FORMAT: "xml" })))
  })

  it("rejects an unknown log level", () => {
    assert.ok(Either.isLeft(decode({ PRESENCE_LOG_LEVEL: "loud" })))
  })

  it("rejects a port out of range", () => {
    assert.ok(Either.isLeft(decode({ PRESENCE_PORT: "70000" })))
  })

  it("rejects a non-positive poll interval", () => {
    assert.ok(Either.isLeft(decode({ PRESENCE_POLL_MS: "0" })))
  })

  it("rejects an inverted rpc port range with a readable message", () => {
    const result = decode({ PRESENCE_RPC_PORT_START: "7000", PRESENCE_RPC_PORT_END: "6999" })
    assert.ok(Either.isLeft(result))
    if (Either.isLeft(result)) {
      assert.match(formatConfigError(result.left), /portStart must not exceed portEnd/)
    }
  })

  it("rejects a sample ratio above 1", () => {
    assert.ok(Either.isLeft(decode({ PRESENCE_OTEL_SAMPLE_RATIO: "2" })))
  })

  it("throws from loadConfigSync", () => {
    assert.throws(() => loadConfigSync({ PRESENCE_PORT: "-1" }))
  })
})

describe("Config service", () => {
  it("withOverrides replaces single fields and keeps the rest of the section", () => {
    const config = withOverrides({ rpc: { enabled: false }, scan: { pollMs: 100 } })
    assert.deepStrictEqual(config.rpc, { enabled: false, portStart: 6463, portEnd: 6472 })
    assert.strictEqual(config.scan.pollMs, 100)
    assert.strictEqual(config.scan.enabled, true)
  })

  it("ConfigForTest provides the overridden config", async () => {
    const program = Effect.gen(function* () {
      const server = yield* serverConfig
      const connector = yield* connectorConfig
      const config = yield* Config
      return { server, connector, rpcStart: config.rpc.portStart }
    })
    const result = await Effect.runPromise(
      program.pipe(Effect.provide(ConfigForTest({ server: { port: 0 } })))
    )
    assert.deepStrictEqual(result.server, { host: "127.0.0.1", port: 0 })
    assert.deepStrictEqual(result.connector, { welcome: DEFAULT_WELCOME, failFast: false })
    assert.strictEqual(result.rpcStart, 6463)
  })
})
