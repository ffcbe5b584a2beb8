import { Effect } from "effect";
import type { ActivityCmd } from "../cmd/types.js";
import { InvalidCommandError, PayloadEncodeError, describeCause } from "../errors.js";
import type { ActivityPayload, EmptyPayload, OutboundPayload, ProcessDetectedEvent } from "../types.js";

/** The "nothing is playing" record, used both to initialize and to clear. */
export function emptyPayload(pid: number, socketId: string): EmptyPayload {
  return { activity: null, pid, socketId };
}

export function processPayload(event: ProcessDetectedEvent): ActivityPayload {
  return {
    activity: {
      application_id: event.id,
      name: event.name,
      timestamps: { start: event.timestamp ?? "0" },
      type: 0,
      metadata: {},
      flags: 0,
    },
    pid: event.pid ?? 0,
    socketId: event.id,
  };
}

/**
 * Payload for a normalized SET_ACTIVITY command. A command without args is
 * rejected; one without an activity becomes the empty record for its pid.
 */
export function commandPayload(cmd: ActivityCmd): Effect.Effect<OutboundPayload, InvalidCommandError> {
  const args = cmd.args;
  if (!args) {
    return Effect.fail(new InvalidCommandError({ cmd: cmd.cmd, reason: "missing args" }));
  }
  const pid = args.pid ?? undefined;
  if (!args.activity) {
    const emptyPid = pid ?? 0;
    return Effect.succeed(emptyPayload(emptyPid, String(emptyPid)));
  }
  return Effect.succeed({
    activity: { ...args.activity, application_id: cmd.application_id },
    pid: pid ?? null,
    socketId: String(pid ?? 0),
  });
}

export function encodePayload(payload: unknown): Effect.Effect<string, PayloadEncodeError> {
  return Effect.try({
    try: () => JSON.stringify(payload),
    catch: (err) => new PayloadEncodeError({ reason: describeCause(err) }),
  });
}
