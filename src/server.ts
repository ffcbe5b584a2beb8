import express from "express";
import { Cause, Effect, Exit, Fiber, Option, Queue, Runtime, type Scope } from "effect";
import type { ActivityCmd } from "./cmd/types.js";
import { Config, ConfigFromValue, type AppConfigType } from "./config/index.js";
import { startConnector, type Connector } from "./connector/index.js";
import type { TransportBindError } from "./errors.js";
import { launchIpcServer } from "./ipc/server.js";
import { logStartup } from "./logging.js";
import {
  annotateSpan,
  makeBridgeRuntime,
  recordError,
  withSpan,
} from "./observability/index.js";
import { launchProcessWatcher } from "./process/watcher.js";
import { launchRpcServer } from "./rpc/server.js";
import { launchWebSocketTransport } from "./transport/websocket.js";
import type { ProcessDetectedEvent, SocketCommand } from "./types.js";

export interface Bridge {
  /** Port the client WebSocket server is bound to */
  readonly port: number;
  readonly ipcPath: string | null;
  readonly rpcPort: number | null;
  readonly connector: Connector;
}

// ============================================================================
// HTTP
// ============================================================================

function registerRoutes(
  app: express.Express,
  connector: Connector,
  runtime: Runtime.Runtime<never>
): void {
  const run = Runtime.runPromise(runtime);

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/state", (_req, res, next) => {
    const effect = connector.status.pipe(
      Effect.tap((status) => annotateSpan("bridge.clients", status.clients)),
      withSpan("http.request", { attributes: { "http.route": "/api/state" } })
    );
    void run(effect)
      .then((status) => {
        res.json(status);
      })
      .catch(next);
  });
}

// ============================================================================
// Producers
// ============================================================================

const startIpc = (queue: Queue.Enqueue<ActivityCmd>) =>
  launchIpcServer(queue).pipe(
    Effect.map((server): string | null => server.path),
    Effect.catchTag("IpcBindError", (err) =>
      Effect.logWarning(`[bridge] IPC disabled: ${err.reason}`).pipe(
        Effect.zipRight(recordError("ipc_bind")),
        Effect.as(null)
      )
    )
  );

const startRpc = (queue: Queue.Enqueue<SocketCommand>, config: AppConfigType) =>
  launchRpcServer(queue, {
    host: config.server.host,
    portStart: config.rpc.portStart,
    portEnd: config.rpc.portEnd,
  }).pipe(
    Effect.map((server): number | null => server.port),
    Effect.catchTag("RpcBindError", (err) =>
      Effect.logWarning(
        `[bridge] RPC disabled: no free port in ${err.portStart}-${err.portEnd}`
      ).pipe(Effect.zipRight(recordError("rpc_bind")), Effect.as(null))
    )
  );

const startScan = (queue: Queue.Enqueue<ProcessDetectedEvent>, config: AppConfigType) =>
  launchProcessWatcher(queue, {
    pollMs: config.scan.pollMs,
    detectablePath: config.scan.detectablePath,
  }).pipe(
    Effect.catchTag("DetectablesLoadError", (err) =>
      Effect.logError(`[bridge] process detection disabled: ${err.path}: ${err.reason}`).pipe(
        Effect.zipRight(recordError("detectables_load"))
      )
    )
  );

// ============================================================================
// Bridge
// ============================================================================

/**
 * Bind the client server and start the connector with every enabled
 * producer. Only the client server's bind failure is an error; producers
 * that cannot start are logged and left out.
 */
export const startBridge: Effect.Effect<Bridge, TransportBindError, Scope.Scope | Config> =
  Effect.gen(function* () {
    const config = yield* Config;
    const ipcQueue = yield* Effect.acquireRelease(Queue.unbounded<ActivityCmd>(), Queue.shutdown);
    const processQueue = yield* Effect.acquireRelease(
      Queue.unbounded<ProcessDetectedEvent>(),
      Queue.shutdown
    );
    const socketQueue = yield* Effect.acquireRelease(
      Queue.unbounded<SocketCommand>(),
      Queue.shutdown
    );

    const app = express();
    const transport = yield* launchWebSocketTransport({
      host: config.server.host,
      port: config.server.port,
      requestListener: app,
    });
    const connector = yield* startConnector(
      transport,
      { ipc: ipcQueue, process: processQueue, socket: socketQueue },
      { welcome: config.connector.welcome, failFast: config.connector.failFast }
    );
    registerRoutes(app, connector, yield* Effect.runtime<never>());

    const ipcPath = config.ipc.enabled ? yield* startIpc(ipcQueue) : null;
    const rpcPort = config.rpc.enabled ? yield* startRpc(socketQueue, config) : null;
    if (config.scan.enabled) yield* startScan(processQueue, config);

    return { port: transport.port, ipcPath, rpcPort, connector };
  });

function describeExit(exit: Exit.Exit<never, TransportBindError>): number {
  if (Exit.isSuccess(exit)) return 0;
  if (Cause.isInterruptedOnly(exit.cause)) return 0;
  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    const err = failure.value;
    logStartup(`cannot listen on ${err.host}:${err.port}: ${err.reason}`);
  } else {
    logStartup(`bridge stopped: ${Cause.pretty(exit.cause)}`);
  }
  return 1;
}

/**
 * Run until SIGINT/SIGTERM or a fatal error. Resolves with the process exit
 * status.
 */
export async function runBridge(config: AppConfigType): Promise<number> {
  const runtime = makeBridgeRuntime(config);
  const program = Effect.scoped(
    Effect.gen(function* () {
      const bridge = yield* startBridge;
      yield* Effect.logInfo(
        `[bridge] clients: ws://${config.server.host}:${bridge.port}` +
          ` ipc: ${bridge.ipcPath ?? "off"} rpc: ${bridge.rpcPort ?? "off"}`
      );
      return yield* Fiber.join(bridge.connector.transportFiber);
    })
  ).pipe(Effect.provide(ConfigFromValue(config)));

  const fiber = runtime.runFork(program);
  const shutdown = () => {
    void runtime.runPromise(Fiber.interrupt(fiber)).catch((err) => {
      logStartup(`shutdown failed: ${String(err)}`);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    const exit = await runtime.runPromise(Fiber.await(fiber));
    return describeExit(exit);
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    await runtime.dispose();
  }
}
