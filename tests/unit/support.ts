import { Effect, Logger, LogLevel, type Scope } from "effect";
import { makePresenceStore } from "../../src/connector/presence.js";
import { makeClientRegistry } from "../../src/connector/registry.js";
import type { DispatchContext } from "../../src/connector/dispatch.js";
import { ClientSendError } from "../../src/errors.js";
import type { ClientHandle, ClientId, FrameData } from "../../src/transport/types.js";

const silent = Logger.minimumLogLevel(LogLevel.None);

export function runTest<A, E>(effect: Effect.Effect<A, E, never>): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(silent)));
}

export function runScoped<A, E>(effect: Effect.Effect<A, E, Scope.Scope>): Promise<A> {
  return runTest(Effect.scoped(effect));
}

export interface FakeClient {
  handle: ClientHandle;
  sent: FrameData[];
}

/** In-memory client; a failing one rejects every send */
export function fakeClient(id: ClientId, options: { failing?: boolean } = {}): FakeClient {
  const sent: FrameData[] = [];
  const handle: ClientHandle = {
    id,
    send: (data) =>
      options.failing
        ? Effect.fail(new ClientSendError({ id, reason: "connection reset" }))
        : Effect.sync(() => {
            sent.push(data);
          }),
  };
  return { handle, sent };
}

export function makeContext(
  options: { welcome?: string; failFast?: boolean } = {}
): Effect.Effect<DispatchContext> {
  return Effect.gen(function* () {
    return {
      registry: yield* makeClientRegistry(),
      presence: yield* makePresenceStore(),
      welcome: options.welcome ?? "welcome",
      failFast: options.failFast ?? false,
    };
  });
}

/** Context with one registered fake client */
export function contextWithClient(
  options: { welcome?: string; failFast?: boolean } = {}
): Effect.Effect<{ ctx: DispatchContext; client: FakeClient }> {
  return Effect.gen(function* () {
    const ctx = yield* makeContext(options);
    const client = fakeClient(1);
    yield* ctx.registry.insert(client.handle);
    return { ctx, client };
  });
}

export function parseSent(client: FakeClient): unknown[] {
  return client.sent.map((frame) =>
    JSON.parse(typeof frame === "string" ? frame : Buffer.from(frame).toString("utf8"))
  );
}
