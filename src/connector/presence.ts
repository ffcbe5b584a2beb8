/**
 * Presence state for the process-detection producer
 *
 * Process detection is level-triggered: the watcher keeps reporting the same
 * session for as long as it runs. This module turns that into edge-triggered
 * notifications, announcing only changes and closing every live session with
 * an empty payload before anything else is shown.
 *
 *   Idle ──id──▶ Live(id) ──same id──▶ Live(id)   (suppressed)
 *     ▲             │ ──other id──▶ Live(other)    (close + open)
 *     └───"null"────┘
 */

import { Effect, Option, Ref } from "effect"
import { NULL_SESSION, type OutboundPayload, type ProcessDetectedEvent } from "../types.js"
import { emptyPayload, processPayload } from "./payload.js"

// ============================================================================
// State
// ============================================================================

export interface PresenceState {
  /** Session currently shown to clients */
  readonly activeSession: Option.Option<string>
  /** Process id announced with `activeSession` */
  readonly lastProcessId: Option.Option<number>
}

export const idlePresence: PresenceState = {
  activeSession: Option.none(),
  lastProcessId: Option.none(),
}

export type PresenceReason = "idle" | "repeat" | "cleared" | "started" | "switched"

export interface PresenceStep {
  readonly reason: PresenceReason
  /** Payloads to broadcast, in order */
  readonly payloads: ReadonlyArray<OutboundPayload>
}

// ============================================================================
// Transition
// ============================================================================

const closeSession = (state: PresenceState, session: string): OutboundPayload =>
  emptyPayload(Option.getOrElse(state.lastProcessId, () => 0), session)

export const stepPresence = (
  state: PresenceState,
  event: ProcessDetectedEvent
): readonly [PresenceStep, PresenceState] => {
  if (event.id === NULL_SESSION) {
    if (Option.isNone(state.activeSession)) {
      return [{ reason: "idle", payloads: [] }, state]
    }
    return [
      { reason: "cleared", payloads: [closeSession(state, state.activeSession.value)] },
      idlePresence,
    ]
  }

  // Only the id is compared; a rename under the same id stays suppressed.
  if (Option.contains(state.activeSession, event.id)) {
    return [{ reason: "repeat", payloads: [] }, state]
  }

  const next: PresenceState = {
    activeSession: Option.some(event.id),
    lastProcessId: Option.fromNullable(event.pid),
  }
  const opening = processPayload(event)

  if (Option.isSome(state.activeSession)) {
    return [
      {
        reason: "switched",
        payloads: [closeSession(state, state.activeSession.value), opening],
      },
      next,
    ]
  }
  return [{ reason: "started", payloads: [opening] }, next]
}

// ============================================================================
// Store
// ============================================================================

export interface PresenceStore {
  /** Decide and transition in one atomic step */
  readonly apply: (event: ProcessDetectedEvent) => Effect.Effect<PresenceStep>
  readonly get: Effect.Effect<PresenceState>
}

export const makePresenceStore = (
  initial: PresenceState = idlePresence
): Effect.Effect<PresenceStore> =>
  Effect.map(Ref.make(initial), (ref) => ({
    apply: (event) => Ref.modify(ref, (state) => stepPresence(state, event)),
    get: Ref.get(ref),
  }))
