export { telemetryLayer } from "./otel.js";
export { makeBridgeRuntime } from "./runtime.js";
export type { BridgeRuntime } from "./runtime.js";
export {
  annotateSpan,
  recordBroadcast,
  recordClientSend,
  recordConnectedClients,
  recordDropped,
  recordError,
  recordPresenceTransition,
  withSpan,
} from "./metrics.js";
export type { SpanAttributes } from "./metrics.js";
