import { Effect, type Fiber, Layer, ManagedRuntime } from "effect";
import type { AppConfigType } from "../config/index.js";
import { loggerLayer } from "../logging.js";
import { telemetryLayer } from "./otel.js";

export interface BridgeRuntime {
  runPromise<A, E>(effect: Effect.Effect<A, E, never>): Promise<A>;
  runFork<A, E>(effect: Effect.Effect<A, E, never>): Fiber.RuntimeFiber<A, E>;
  dispose(): Promise<void>;
}

/**
 * One runtime per process, carrying the configured logger and, when
 * enabled, the telemetry exporters. Metrics are tagged with the deployment
 * environment.
 */
export function makeBridgeRuntime(config: AppConfigType): BridgeRuntime {
  const runtime = ManagedRuntime.make(
    Layer.merge(telemetryLayer(config.otel), loggerLayer(config.log))
  );
  const tagged = Effect.tagMetrics("environment", config.otel.environment);
  return {
    runPromise: (effect) => runtime.runPromise(tagged(effect)),
    runFork: (effect) => runtime.runFork(tagged(effect)),
    dispose: () => runtime.dispose(),
  };
}
