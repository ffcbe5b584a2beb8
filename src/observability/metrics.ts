import { Effect, Metric, MetricLabel } from "effect";

/*
 * Metrics and spans are always recorded; they leave the process only when
 * the runtime carries the telemetry layer.
 */

const broadcasts = Metric.counter("bridge_broadcasts_total", {
  description: "Payloads fanned out to clients, by producer",
  incremental: true,
});
const clientSends = Metric.counter("bridge_client_sends_total", {
  description: "Frames written to individual clients, by outcome",
  incremental: true,
});
const dropped = Metric.counter("bridge_events_dropped_total", {
  description: "Producer events that never reached a broadcast",
  incremental: true,
});
const transitions = Metric.counter("bridge_presence_transitions_total", {
  description: "Process-detection presence steps, by kind",
  incremental: true,
});
const errors = Metric.counter("bridge_errors_total", {
  description: "Logged failures, by type",
  incremental: true,
});
const connectedClients = Metric.gauge("bridge_connected_clients", {
  description: "Clients currently registered for broadcasts",
});

type Labels = Readonly<Record<string, string>>;

const bump = (counter: Metric.Metric.Counter<number>, labels: Labels): Effect.Effect<void> =>
  Metric.increment(
    Metric.taggedWithLabels(
      counter,
      Object.entries(labels).map(([key, value]) => MetricLabel.make(key, value))
    )
  );

export const recordBroadcast = (source: string) => bump(broadcasts, { source });

export const recordClientSend = (status: "ok" | "error") => bump(clientSends, { status });

export const recordDropped = (source: string, reason: string) =>
  bump(dropped, { source, reason });

export const recordPresenceTransition = (reason: string) => bump(transitions, { reason });

export const recordError = (type: string) => bump(errors, { error_type: type });

export const recordConnectedClients = (total: number): Effect.Effect<void> =>
  Metric.set(connectedClients, total);

export type SpanAttributes = Record<string, string | number | boolean>;

/** Pipeable `Effect.withSpan` */
export const withSpan =
  (name: string, options?: { attributes?: SpanAttributes }) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.withSpan(effect, name, options);

export const annotateSpan = (key: string, value: string | number | boolean): Effect.Effect<void> =>
  Effect.annotateCurrentSpan(key, value);
