import { Effect, Queue, Runtime } from "effect";

/**
 * Entry point from node event-emitter callbacks back into the runtime that
 * created the listener, so queue offers and logs keep its logger and spans.
 */
export interface CallbackBridge {
  /** Enqueue without blocking; dropped once the queue has been shut down */
  offer<A>(queue: Queue.Enqueue<A>, value: A): void;
  /** Fire-and-forget, typically a log line */
  run(effect: Effect.Effect<void>): void;
}

export const makeCallbackBridge: Effect.Effect<CallbackBridge> = Effect.map(
  Effect.runtime<never>(),
  (runtime) => {
    const runSync = Runtime.runSync(runtime);
    const runFork = Runtime.runFork(runtime);
    return {
      offer: (queue, value) => {
        runSync(
          Effect.unlessEffect(Queue.offer(queue, value), Queue.isShutdown(queue))
        );
      },
      run: (effect) => {
        runFork(effect);
      },
    };
  }
);
