import http from "http";
import { Effect, Either, Option, ParseResult, type Queue, type Scope } from "effect";
import { WebSocket, WebSocketServer } from "ws";
import { makeCallbackBridge, type CallbackBridge } from "../callbacks.js";
import {
  clearingCommand,
  commandReply,
  errorReply,
  passthroughReply,
  readyDispatch,
} from "../cmd/replies.js";
import { decodeActivityCmd, SET_ACTIVITY } from "../cmd/types.js";
import { RpcBindError, describeCause } from "../errors.js";
import { closeServer, closeSockets, listen, toFrame } from "../transport/websocket.js";
import type { SocketCommand } from "../types.js";

export interface RpcServerOptions {
  host: string;
  portStart: number;
  portEnd: number;
}

export interface RpcServer {
  readonly port: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseCommand(text: string): Option.Option<Record<string, unknown>> {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? Option.some(parsed) : Option.none();
  } catch {
    return Option.none();
  }
}

function clientIdOf(req: http.IncomingMessage): string | null {
  const url = new URL(req.url ?? "/", "http://localhost");
  const clientId = url.searchParams.get("client_id");
  return clientId && clientId.length > 0 ? clientId : null;
}

function reply(socket: WebSocket, body: unknown): void {
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(JSON.stringify(body));
}

function attach(
  socket: WebSocket,
  clientId: string,
  queue: Queue.Enqueue<SocketCommand>,
  bridge: CallbackBridge
): void {
  let lastPid: number | null = null;
  let activitySet = false;

  socket.on("message", (raw, isBinary) => {
    const frame = toFrame(raw, isBinary);
    const command = typeof frame === "string" ? parseCommand(frame) : Option.none();
    if (Option.isNone(command)) {
      bridge.run(Effect.logWarning(`[rpc] ignoring non-JSON message from ${clientId}`));
      reply(socket, errorReply(4002, "Payload is not a JSON object"));
      return;
    }
    const body = command.value;
    const name = body.cmd;
    if (typeof name !== "string") {
      bridge.run(Effect.logWarning(`[rpc] command without cmd from ${clientId}`));
      reply(socket, errorReply(4000, "Invalid payload"));
      return;
    }
    if (name !== SET_ACTIVITY) {
      bridge.offer(queue, { ...body, application_id: clientId });
      reply(socket, passthroughReply(name, body.nonce));
      return;
    }
    const decoded = decodeActivityCmd(body);
    if (Either.isLeft(decoded)) {
      const details = ParseResult.TreeFormatter.formatErrorSync(decoded.left);
      bridge.run(Effect.logWarning(`[rpc] malformed command from ${clientId}: ${details}`));
      reply(socket, errorReply(4000, "Invalid payload"));
      return;
    }
    const cmd = decoded.right;
    const pid = cmd.args?.pid;
    lastPid = typeof pid === "number" ? pid : lastPid;
    activitySet = Boolean(cmd.args?.activity);
    bridge.offer(queue, { ...body, application_id: clientId });
    reply(socket, commandReply(cmd));
  });
  socket.on("error", (err) => {
    bridge.run(Effect.logDebug(`[rpc] socket error from ${clientId}: ${err.message}`));
  });
  socket.on("close", () => {
    if (activitySet) bridge.offer(queue, clearingCommand(clientId, lastPid));
  });
}

function bindInRange(
  server: http.Server,
  options: RpcServerOptions
): Effect.Effect<number, RpcBindError> {
  return Effect.gen(function* () {
    for (let port = options.portStart; port <= options.portEnd; port += 1) {
      const bound = yield* Effect.either(listen(server, options.host, port));
      if (Either.isRight(bound)) return bound.right;
      yield* Effect.logDebug(`[rpc] port ${port} unavailable: ${bound.left.reason}`);
    }
    return yield* Effect.fail(
      new RpcBindError({ portStart: options.portStart, portEnd: options.portEnd })
    );
  });
}

/**
 * WebSocket command endpoint for browser-based producers. Every message is
 * forwarded to the socket queue as parsed, tagged with the connection's
 * `client_id`.
 */
export const launchRpcServer = (
  queue: Queue.Enqueue<SocketCommand>,
  options: RpcServerOptions
): Effect.Effect<RpcServer, RpcBindError, Scope.Scope> =>
  Effect.gen(function* () {
    const bridge = yield* makeCallbackBridge;
    const server = http.createServer((_req, res) => {
      res.writeHead(404).end();
    });

    const port = yield* Effect.acquireRelease(bindInRange(server, options), () =>
      closeServer(server)
    );
    const wss = yield* Effect.acquireRelease(
      Effect.sync(() => new WebSocketServer({ server })),
      (created) => closeSockets(created)
    );

    wss.on("connection", (socket, req) => {
      const clientId = clientIdOf(req);
      if (clientId === null) {
        socket.close(4000, "Invalid Client ID");
        return;
      }
      bridge.run(Effect.logInfo(`[rpc] client ${clientId} connected`));
      reply(socket, readyDispatch());
      attach(socket, clientId, queue, bridge);
    });
    wss.on("error", (err) => {
      bridge.run(Effect.logError(`[rpc] server error: ${describeCause(err)}`));
    });

    yield* Effect.logInfo(`[rpc] listening on ${options.host}:${port}`);
    return { port };
  });
