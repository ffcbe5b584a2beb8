/**
 * Per-source dispatch
 *
 * One handler per producer. Every handler checks for an audience before it
 * touches the event, so with no clients connected nothing is decoded,
 * normalized or serialized.
 */

import { Effect, Either, Option, ParseResult } from "effect"
import { normalizeActivityCmd } from "../cmd/normalize.js"
import { decodeActivityCmd, SET_ACTIVITY, type ActivityCmd } from "../cmd/types.js"
import { UnknownClientError } from "../errors.js"
import {
  annotateSpan,
  recordConnectedClients,
  recordDropped,
  recordError,
  recordPresenceTransition,
  withSpan,
} from "../observability/index.js"
import type { ClientHandle, ClientId, FrameData, TransportEvent } from "../transport/types.js"
import type { EventSource, OutboundPayload, ProcessDetectedEvent, SocketCommand } from "../types.js"
import { broadcast } from "./broadcast.js"
import { commandPayload, encodePayload } from "./payload.js"
import type { PresenceStore } from "./presence.js"
import type { ClientRegistry } from "./registry.js"

export interface DispatchContext {
  readonly registry: ClientRegistry
  readonly presence: PresenceStore
  /** Sent verbatim to each client before it is registered */
  readonly welcome: string
  /** Die instead of logging when an inbound message names an unknown client */
  readonly failFast: boolean
}

// ============================================================================
// Shared Steps
// ============================================================================

const hasAudience = (registry: ClientRegistry, source: EventSource): Effect.Effect<boolean> =>
  Effect.gen(function* () {
    if ((yield* registry.size) > 0) return true
    yield* recordDropped(source, "no_audience")
    return false
  })

const sendPayload = (
  registry: ClientRegistry,
  payload: OutboundPayload | SocketCommand,
  source: EventSource
): Effect.Effect<void> =>
  encodePayload(payload).pipe(
    Effect.flatMap((text) => broadcast(registry, text, source)),
    Effect.asVoid,
    Effect.catchTag("PayloadEncodeError", (err) =>
      Effect.logWarning(`[connector] dropping ${source} payload: ${err.reason}`).pipe(
        Effect.zipRight(recordDropped(source, "encode")),
        Effect.zipRight(recordError("payload_encode"))
      )
    )
  )

const sendActivityCmd = (
  registry: ClientRegistry,
  cmd: ActivityCmd,
  source: EventSource
): Effect.Effect<void> =>
  commandPayload(normalizeActivityCmd(cmd)).pipe(
    Effect.flatMap((payload) => sendPayload(registry, payload, source)),
    Effect.catchTag("InvalidCommandError", (err) =>
      Effect.logWarning(`[connector] dropping ${source} ${err.cmd}: ${err.reason}`).pipe(
        Effect.zipRight(recordDropped(source, "invalid"))
      )
    )
  )

// ============================================================================
// Producers
// ============================================================================

/** IPC commands pass straight through; no presence state is consulted. */
export const dispatchIpcCommand = (ctx: DispatchContext, cmd: ActivityCmd): Effect.Effect<void> =>
  Effect.gen(function* () {
    if (!(yield* hasAudience(ctx.registry, "ipc"))) return
    yield* annotateSpan("cmd", cmd.cmd)
    yield* sendActivityCmd(ctx.registry, cmd, "ipc")
  }).pipe(withSpan("connector.ipc"))

export const dispatchProcessEvent = (
  ctx: DispatchContext,
  event: ProcessDetectedEvent
): Effect.Effect<void> =>
  Effect.gen(function* () {
    if (!(yield* hasAudience(ctx.registry, "process"))) return
    const step = yield* ctx.presence.apply(event)
    yield* recordPresenceTransition(step.reason)
    yield* annotateSpan("presence.reason", step.reason)
    if (step.payloads.length === 0) {
      yield* Effect.logDebug(`[connector] process ${event.id} suppressed (${step.reason})`)
      return
    }
    yield* Effect.logInfo(`[connector] process ${event.id} ${step.reason}`)
    for (const payload of step.payloads) {
      yield* sendPayload(ctx.registry, payload, "process")
    }
  }).pipe(withSpan("connector.process"))

/**
 * Commands other than SET_ACTIVITY are control messages for the clients and
 * are re-serialized as received.
 */
export const dispatchSocketCommand = (
  ctx: DispatchContext,
  command: SocketCommand
): Effect.Effect<void> =>
  Effect.gen(function* () {
    if (!(yield* hasAudience(ctx.registry, "socket"))) return
    if (command.cmd !== SET_ACTIVITY) {
      yield* annotateSpan("passthrough", true)
      yield* sendPayload(ctx.registry, command, "socket")
      return
    }
    const decoded = decodeActivityCmd(command)
    if (Either.isLeft(decoded)) {
      const details = ParseResult.TreeFormatter.formatErrorSync(decoded.left)
      yield* Effect.logWarning(`[connector] dropping malformed socket command: ${details}`)
      yield* recordDropped("socket", "malformed")
      return
    }
    yield* sendActivityCmd(ctx.registry, decoded.right, "socket")
  }).pipe(withSpan("connector.socket"))

// ============================================================================
// Transport
// ============================================================================

const sendDirect = (
  send: Effect.Effect<void, { readonly reason: string }>,
  id: ClientId,
  what: string
): Effect.Effect<void> =>
  Effect.catchAll(send, (err) =>
    Effect.logWarning(`[connector] ${what} to client ${id} failed: ${err.reason}`).pipe(
      Effect.zipRight(recordError("client_send"))
    )
  )

const unknownClient = (ctx: DispatchContext, id: ClientId): Effect.Effect<void> =>
  ctx.failFast
    ? Effect.die(new UnknownClientError({ id }))
    : Effect.logError(`[connector] message from unregistered client ${id}`).pipe(
        Effect.zipRight(recordError("unknown_client"))
      )

const echo = (ctx: DispatchContext, id: ClientId, data: FrameData): Effect.Effect<void> =>
  Effect.flatMap(ctx.registry.lookup(id), (handle) =>
    Option.match(handle, {
      onNone: () => unknownClient(ctx, id),
      onSome: (found) => sendDirect(found.send(data), id, "echo"),
    })
  )

const connect = (ctx: DispatchContext, handle: ClientHandle): Effect.Effect<void> =>
  Effect.gen(function* () {
    yield* sendDirect(handle.send(ctx.welcome), handle.id, "welcome")
    const total = yield* ctx.registry.insert(handle)
    yield* recordConnectedClients(total)
    yield* Effect.logInfo(`[connector] client ${handle.id} connected (${total} total)`)
  })

const disconnect = (ctx: DispatchContext, id: ClientId): Effect.Effect<void> =>
  Effect.gen(function* () {
    const removed = yield* ctx.registry.remove(id)
    if (!removed) return
    const total = yield* ctx.registry.size
    yield* recordConnectedClients(total)
    yield* Effect.logInfo(`[connector] client ${id} disconnected (${total} left)`)
  })

export const dispatchTransportEvent = (
  ctx: DispatchContext,
  event: TransportEvent
): Effect.Effect<void> => {
  switch (event._tag) {
    case "Connected":
      return connect(ctx, event.handle)
    case "Disconnected":
      return disconnect(ctx, event.id)
    case "Message":
      return echo(ctx, event.id, event.data)
  }
}
