import type { Activity } from "./cmd/types.js";

/** Session id the process watcher reports when nothing is running. */
export const NULL_SESSION = "null";

export interface ProcessDetectedEvent {
  id: string;
  name: string;
  timestamp?: string;
  pid?: number;
}

export interface EmptyPayload {
  readonly activity: null;
  readonly pid: number;
  readonly socketId: string;
}

export interface ActivityPayload {
  readonly activity: Activity;
  readonly pid: number | null;
  readonly socketId: string;
}

export type OutboundPayload = EmptyPayload | ActivityPayload;

/** A JSON object received on the socket command channel, kept as parsed. */
export type SocketCommand = Readonly<Record<string, unknown>>;

export type EventSource = "ipc" | "process" | "socket";

export interface BridgeStatus {
  clients: number;
  activeSession: string | null;
  lastProcessId: number | null;
}
