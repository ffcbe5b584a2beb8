import { SET_ACTIVITY, type ActivityCmd } from "./types.js";

export interface CommandReply {
  cmd: string;
  data: unknown;
  evt: string | null;
  nonce: string | null;
}

/** First frame a producer client receives after connecting */
export function readyDispatch(): CommandReply {
  return {
    cmd: "DISPATCH",
    evt: "READY",
    data: {
      v: 1,
      config: { environment: "production" },
      user: { id: "0", username: "presence-bridge", discriminator: "0", avatar: null },
    },
    nonce: null,
  };
}

/** Acknowledges a command; SET_ACTIVITY echoes the activity it accepted */
export function commandReply(cmd: ActivityCmd): CommandReply {
  return {
    cmd: cmd.cmd,
    data: cmd.cmd === SET_ACTIVITY ? (cmd.args?.activity ?? null) : null,
    evt: null,
    nonce: cmd.nonce ?? null,
  };
}

/** Acknowledges a command forwarded without validation; only a string nonce is echoed */
export function passthroughReply(cmd: string, nonce: unknown): CommandReply {
  return { cmd, data: null, evt: null, nonce: typeof nonce === "string" ? nonce : null };
}

export function errorReply(code: number, message: string, nonce: string | null = null): CommandReply {
  return { cmd: "DISPATCH", evt: "ERROR", data: { code, message }, nonce };
}

/** Sent on behalf of a producer client that went away with an activity set */
export function clearingCommand(applicationId: string, pid: number | null): ActivityCmd {
  return {
    cmd: SET_ACTIVITY,
    application_id: applicationId,
    args: { pid, activity: null },
    nonce: null,
  };
}
