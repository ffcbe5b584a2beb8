/**
 * Transport listener types
 */

import type { Effect, Queue } from "effect"
import { Data } from "effect"
import type { ClientSendError } from "../errors.js"

/** Opaque per-connection id, unique among live connections */
export type ClientId = number

/** Text frames arrive as strings, binary frames as bytes */
export type FrameData = string | Uint8Array

/** Send capability for one connection, owned by the client registry */
export interface ClientHandle {
  readonly id: ClientId
  readonly send: (data: FrameData) => Effect.Effect<void, ClientSendError>
}

export type TransportEvent = Data.TaggedEnum<{
  Connected: { readonly id: ClientId; readonly handle: ClientHandle }
  Disconnected: { readonly id: ClientId }
  Message: { readonly id: ClientId; readonly data: FrameData }
}>

export const TransportEvent = Data.taggedEnum<TransportEvent>()

export interface Transport {
  /** Port actually bound (differs from the requested one when that was 0) */
  readonly port: number
  readonly events: Queue.Dequeue<TransportEvent>
}
