import { Effect } from "effect";
import type { EventSource } from "../types.js";
import type { FrameData } from "../transport/types.js";
import { recordBroadcast, recordClientSend, recordError } from "../observability/index.js";
import type { ClientRegistry } from "./registry.js";

export interface BroadcastResult {
  readonly attempted: number;
  readonly failed: number;
}

/**
 * Send one frame to every registered client. Recipients are taken from a
 * snapshot, so a client that joins mid-broadcast misses this frame and one
 * that leaves may still be attempted. A failed send is logged and skipped;
 * the client stays registered until its own disconnect arrives.
 */
export const broadcast = (
  registry: ClientRegistry,
  data: FrameData,
  source: EventSource
): Effect.Effect<BroadcastResult> =>
  Effect.gen(function* () {
    const handles = yield* registry.handles;
    let failed = 0;
    for (const handle of handles) {
      yield* handle.send(data).pipe(
        Effect.tap(() => recordClientSend("ok")),
        Effect.catchAll((err) => {
          failed += 1;
          return Effect.logWarning(`[broadcast] send to client ${err.id} failed: ${err.reason}`).pipe(
            Effect.zipRight(recordClientSend("error")),
            Effect.zipRight(recordError("client_send"))
          );
        })
      );
    }
    yield* recordBroadcast(source);
    return { attempted: handles.length, failed };
  });
