import fs from "fs";
import net from "net";
import path from "path";
import { Effect, Either, ParseResult, type Queue, type Scope } from "effect";
import { makeCallbackBridge, type CallbackBridge } from "../callbacks.js";
import { clearingCommand, commandReply, errorReply, readyDispatch } from "../cmd/replies.js";
import { decodeActivityCmd, SET_ACTIVITY, type ActivityCmd } from "../cmd/types.js";
import { IpcBindError, describeCause } from "../errors.js";
import { IpcOp, PacketDecoder, encodePacket, type IpcPacket } from "./codec.js";

const SOCKET_SLOTS = 10;

export interface IpcServerOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

export interface IpcServer {
  readonly path: string;
}

export function ipcSocketPath(
  index: number,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === "win32") return `\\\\?\\pipe\\discord-ipc-${index}`;
  const base = env.XDG_RUNTIME_DIR || env.TMPDIR || env.TMP || env.TEMP || "/tmp";
  return path.join(base.replace(/\/$/, ""), `discord-ipc-${index}`);
}

// ============================================================================
// Binding
// ============================================================================

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function listenOn(server: net.Server, socketPath: string): Effect.Effect<void, unknown> {
  return Effect.async<void, unknown>((resume) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      resume(Effect.fail(err));
    };
    const onListening = () => {
      server.off("error", onError);
      resume(Effect.void);
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(socketPath);
  });
}

/** A path is live when something accepts a connection on it */
function isLive(socketPath: string): Effect.Effect<boolean> {
  return Effect.async<boolean>((resume) => {
    const probe = net.connect(socketPath);
    probe.once("connect", () => {
      probe.destroy();
      resume(Effect.succeed(true));
    });
    probe.once("error", () => resume(Effect.succeed(false)));
  });
}

function tryBind(
  server: net.Server,
  socketPath: string,
  platform: NodeJS.Platform
): Effect.Effect<boolean, IpcBindError> {
  return listenOn(server, socketPath).pipe(
    Effect.as(true),
    Effect.catchAll((err) => {
      if (errorCode(err) !== "EADDRINUSE") {
        return Effect.fail(new IpcBindError({ reason: `${socketPath}: ${describeCause(err)}` }));
      }
      if (platform === "win32") return Effect.succeed(false);
      return Effect.flatMap(isLive(socketPath), (live) => {
        if (live) return Effect.succeed(false);
        return Effect.logDebug(`[ipc] removing stale socket ${socketPath}`).pipe(
          Effect.zipRight(
            Effect.tryPromise({
              try: () => fs.promises.unlink(socketPath),
              catch: (cause) =>
                new IpcBindError({ reason: `${socketPath}: ${describeCause(cause)}` }),
            })
          ),
          Effect.zipRight(listenOn(server, socketPath)),
          Effect.as(true),
          Effect.catchAll((cause) =>
            cause instanceof IpcBindError
              ? Effect.fail(cause)
              : Effect.fail(new IpcBindError({ reason: `${socketPath}: ${describeCause(cause)}` }))
          )
        );
      });
    })
  );
}

function bindFirstFree(
  server: net.Server,
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv
): Effect.Effect<string, IpcBindError> {
  return Effect.gen(function* () {
    for (let index = 0; index < SOCKET_SLOTS; index += 1) {
      const socketPath = ipcSocketPath(index, platform, env);
      if (yield* tryBind(server, socketPath, platform)) return socketPath;
    }
    return yield* Effect.fail(new IpcBindError({ reason: "every socket slot is in use" }));
  });
}

// ============================================================================
// Connections
// ============================================================================

interface IpcConnection {
  clientId: string | null;
  lastPid: number | null;
  activitySet: boolean;
}

function isHandshake(body: unknown): body is { client_id: string } {
  return (
    typeof body === "object" &&
    body !== null &&
    "client_id" in body &&
    typeof body.client_id === "string" &&
    body.client_id.length > 0
  );
}

function attach(
  socket: net.Socket,
  queue: Queue.Enqueue<ActivityCmd>,
  bridge: CallbackBridge
): void {
  const decoder = new PacketDecoder();
  const conn: IpcConnection = { clientId: null, lastPid: null, activitySet: false };

  const write = (op: IpcOp, body: unknown) => {
    if (!socket.writable) return;
    socket.write(encodePacket(op, body));
  };
  const close = (code: number, message: string) => {
    write(IpcOp.Close, { code, message });
    socket.end();
  };

  const onFrame = (body: unknown, clientId: string) => {
    const decoded = decodeActivityCmd(body);
    if (Either.isLeft(decoded)) {
      const details = ParseResult.TreeFormatter.formatErrorSync(decoded.left);
      bridge.run(Effect.logWarning(`[ipc] malformed frame from ${clientId}: ${details}`));
      write(IpcOp.Frame, errorReply(4000, "Invalid payload"));
      return;
    }
    const cmd = decoded.right;
    if (cmd.cmd === SET_ACTIVITY) {
      const stamped: ActivityCmd = { ...cmd, application_id: clientId };
      const pid = cmd.args?.pid;
      conn.lastPid = typeof pid === "number" ? pid : conn.lastPid;
      conn.activitySet = Boolean(cmd.args?.activity);
      bridge.offer(queue, stamped);
    }
    write(IpcOp.Frame, commandReply(cmd));
  };

  const onPacket = (packet: IpcPacket) => {
    switch (packet.op) {
      case IpcOp.Handshake:
        if (!isHandshake(packet.body)) {
          close(4000, "Invalid client ID");
          return;
        }
        conn.clientId = packet.body.client_id;
        bridge.run(Effect.logInfo(`[ipc] handshake from ${conn.clientId}`));
        write(IpcOp.Frame, readyDispatch());
        return;
      case IpcOp.Frame:
        if (conn.clientId === null) {
          close(4000, "Handshake required");
          return;
        }
        onFrame(packet.body, conn.clientId);
        return;
      case IpcOp.Ping:
        write(IpcOp.Pong, packet.body);
        return;
      case IpcOp.Close:
        socket.end();
        return;
      case IpcOp.Pong:
        return;
    }
  };

  socket.on("data", (chunk: Buffer) => {
    const result = decoder.push(chunk);
    if (Either.isLeft(result)) {
      bridge.run(Effect.logWarning(`[ipc] protocol error: ${result.left.reason}`));
      close(1003, result.left.reason);
      return;
    }
    for (const packet of result.right) onPacket(packet);
  });
  socket.on("error", (err) => {
    bridge.run(Effect.logDebug(`[ipc] socket error: ${err.message}`));
  });
  socket.on("close", () => {
    if (conn.clientId !== null && conn.activitySet) {
      bridge.offer(queue, clearingCommand(conn.clientId, conn.lastPid));
    }
  });
}

/**
 * Serve the local IPC socket on the first free slot. Accepted SET_ACTIVITY
 * commands are offered to `queue` with the handshake's client id stamped in.
 */
export const launchIpcServer = (
  queue: Queue.Enqueue<ActivityCmd>,
  options: IpcServerOptions = {}
): Effect.Effect<IpcServer, IpcBindError, Scope.Scope> =>
  Effect.gen(function* () {
    const platform = options.platform ?? process.platform;
    const env = options.env ?? process.env;
    const bridge = yield* makeCallbackBridge;
    const sockets = new Set<net.Socket>();

    const server = net.createServer((socket) => {
      sockets.add(socket);
      socket.on("close", () => sockets.delete(socket));
      attach(socket, queue, bridge);
    });

    const socketPath = yield* Effect.acquireRelease(
      bindFirstFree(server, platform, env),
      () =>
        Effect.async<void>((resume) => {
          for (const socket of sockets) socket.destroy();
          server.close(() => resume(Effect.void));
        })
    );

    yield* Effect.logInfo(`[ipc] listening on ${socketPath}`);
    return { path: socketPath };
  });
