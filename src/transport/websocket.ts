import http from "http";
import { Effect, Queue, type Scope } from "effect";
import { WebSocket, WebSocketServer } from "ws";
import { makeCallbackBridge } from "../callbacks.js";
import { ClientSendError, TransportBindError, describeCause } from "../errors.js";
import {
  TransportEvent,
  type ClientHandle,
  type ClientId,
  type FrameData,
  type Transport,
} from "./types.js";

export interface WebSocketTransportOptions {
  host: string;
  /** 0 picks a free port; the bound one is reported on the transport */
  port: number;
  /** Plain HTTP requests on the same port, e.g. an express app */
  requestListener?: http.RequestListener;
}

export function toFrame(raw: WebSocket.RawData, isBinary: boolean): FrameData {
  const buffer = Array.isArray(raw)
    ? Buffer.concat(raw)
    : Buffer.isBuffer(raw)
      ? raw
      : Buffer.from(raw);
  return isBinary ? buffer : buffer.toString("utf8");
}

function sendFrame(
  socket: WebSocket,
  id: ClientId,
  data: FrameData
): Effect.Effect<void, ClientSendError> {
  return Effect.suspend(() => {
    if (socket.readyState !== WebSocket.OPEN) {
      return Effect.fail(new ClientSendError({ id, reason: "socket not open" }));
    }
    return Effect.try({
      try: () => socket.send(data),
      catch: (err) => new ClientSendError({ id, reason: describeCause(err) }),
    });
  });
}

function boundPort(server: http.Server, fallback: number): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : fallback;
}

export function listen(
  server: http.Server,
  host: string,
  port: number
): Effect.Effect<number, TransportBindError> {
  return Effect.async<number, TransportBindError>((resume) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      resume(Effect.fail(new TransportBindError({ host, port, reason: err.message })));
    };
    const onListening = () => {
      server.off("error", onError);
      resume(Effect.succeed(boundPort(server, port)));
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

export function closeServer(server: http.Server): Effect.Effect<void> {
  return Effect.async<void>((resume) => {
    server.close(() => resume(Effect.void));
    server.closeAllConnections();
  });
}

export function closeSockets(wss: WebSocketServer): Effect.Effect<void> {
  return Effect.async<void>((resume) => {
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close(() => resume(Effect.void));
  });
}

/**
 * Bind the client-facing WebSocket server. Connection lifecycle and inbound
 * frames are published on `events`; the queue shuts down with the scope,
 * after the sockets are closed.
 */
export const launchWebSocketTransport = (
  options: WebSocketTransportOptions
): Effect.Effect<Transport, TransportBindError, Scope.Scope> =>
  Effect.gen(function* () {
    const bridge = yield* makeCallbackBridge;
    const events = yield* Effect.acquireRelease(
      Queue.unbounded<TransportEvent>(),
      (queue) => Queue.shutdown(queue)
    );

    const server = options.requestListener
      ? http.createServer(options.requestListener)
      : http.createServer();
    const port = yield* Effect.acquireRelease(
      listen(server, options.host, options.port),
      () => closeServer(server)
    );

    const wss = yield* Effect.acquireRelease(
      Effect.sync(() => new WebSocketServer({ server })),
      (created) => closeSockets(created)
    );

    let nextId = 0;
    wss.on("connection", (socket) => {
      nextId += 1;
      const id = nextId;
      const handle: ClientHandle = { id, send: (data) => sendFrame(socket, id, data) };
      bridge.offer(events, TransportEvent.Connected({ id, handle }));
      socket.on("message", (raw, isBinary) => {
        bridge.offer(events, TransportEvent.Message({ id, data: toFrame(raw, isBinary) }));
      });
      socket.on("close", () => {
        bridge.offer(events, TransportEvent.Disconnected({ id }));
      });
      socket.on("error", (err) => {
        bridge.run(Effect.logWarning(`[transport] client ${id} error: ${err.message}`));
      });
    });
    wss.on("error", (err) => {
      bridge.run(Effect.logError(`[transport] server error: ${err.message}`));
    });

    yield* Effect.logInfo(`[transport] bound ${options.host}:${port}`);
    return { port, events };
  });
