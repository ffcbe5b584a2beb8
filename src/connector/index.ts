/**
 * Connector: fan-in of the three producers and the transport into one
 * broadcast stream.
 *
 * Four fibers, each draining one queue in FIFO order. Fibers never wait on
 * each other; the registry and the presence state are separate Refs.
 */

import { Effect, Fiber, Option, Queue, type Scope } from "effect"
import type { ActivityCmd } from "../cmd/types.js"
import type { Transport } from "../transport/types.js"
import type { BridgeStatus, ProcessDetectedEvent, SocketCommand } from "../types.js"
import {
  dispatchIpcCommand,
  dispatchProcessEvent,
  dispatchSocketCommand,
  dispatchTransportEvent,
  type DispatchContext,
} from "./dispatch.js"
import { makePresenceStore, type PresenceStore } from "./presence.js"
import { makeClientRegistry, type ClientRegistry } from "./registry.js"

export interface ProducerQueues {
  readonly ipc: Queue.Dequeue<ActivityCmd>
  readonly process: Queue.Dequeue<ProcessDetectedEvent>
  readonly socket: Queue.Dequeue<SocketCommand>
}

export interface ConnectorOptions {
  readonly welcome: string
  readonly failFast: boolean
}

export interface Connector {
  readonly registry: ClientRegistry
  readonly presence: PresenceStore
  readonly status: Effect.Effect<BridgeStatus>
  /** Ends when the transport queue shuts down, or dies under failFast */
  readonly transportFiber: Fiber.RuntimeFiber<never>
}

// ============================================================================
// Loops
// ============================================================================

const drain = <A>(queue: Queue.Dequeue<A>, handle: (item: A) => Effect.Effect<void>) =>
  Effect.forever(Effect.flatMap(Queue.take(queue), handle))

/** A defect in one event must not stop the producer's loop */
const isolate =
  <A>(source: string, handle: (item: A) => Effect.Effect<void>) =>
  (item: A): Effect.Effect<void> =>
    Effect.catchAllDefect(handle(item), (defect) =>
      Effect.logError(`[connector] ${source} handler defect`, defect)
    )

// ============================================================================
// Startup
// ============================================================================

export const startConnector = (
  transport: Transport,
  producers: ProducerQueues,
  options: ConnectorOptions
): Effect.Effect<Connector, never, Scope.Scope> =>
  Effect.gen(function* () {
    const registry = yield* makeClientRegistry()
    const presence = yield* makePresenceStore()
    const ctx: DispatchContext = {
      registry,
      presence,
      welcome: options.welcome,
      failFast: options.failFast,
    }

    const transportFiber = yield* Effect.forkScoped(
      drain(transport.events, (event) => dispatchTransportEvent(ctx, event))
    )
    yield* Effect.forkScoped(
      drain(producers.ipc, isolate("ipc", (cmd: ActivityCmd) => dispatchIpcCommand(ctx, cmd)))
    )
    yield* Effect.forkScoped(
      drain(
        producers.process,
        isolate("process", (event: ProcessDetectedEvent) => dispatchProcessEvent(ctx, event))
      )
    )
    yield* Effect.forkScoped(
      drain(
        producers.socket,
        isolate("socket", (command: SocketCommand) => dispatchSocketCommand(ctx, command))
      )
    )

    const status = Effect.gen(function* () {
      const clients = yield* registry.size
      const state = yield* presence.get
      return {
        clients,
        activeSession: Option.getOrNull(state.activeSession),
        lastProcessId: Option.getOrNull(state.lastProcessId),
      }
    })

    yield* Effect.logInfo(`[connector] listening for clients on port ${transport.port}`)
    return { registry, presence, status, transportFiber }
  })
