import test from "node:test";
import assert from "node:assert/strict";
import { Effect } from "effect";
import { broadcast } from "../../src/connector/broadcast.js";
import { makeClientRegistry } from "../../src/connector/registry.js";
import { fakeClient, runTest } from "./support.js";

test("broadcast attempts every client and skips past a failing one", async () => {
  const first = fakeClient(1);
  const broken = fakeClient(2, { failing: true });
  const third = fakeClient(3);

  const result = await runTest(
    Effect.gen(function* () {
      const registry = yield* makeClientRegistry();
      for (const client of [first, broken, third]) {
        yield* registry.insert(client.handle);
      }
      const outcome = yield* broadcast(registry, "frame", "ipc");
      const size = yield* registry.size;
      return { outcome, size };
    })
  );

  assert.deepEqual(result.outcome, { attempted: 3, failed: 1 });
  assert.deepEqual(first.sent, ["frame"]);
  assert.deepEqual(third.sent, ["frame"]);
  assert.equal(result.size, 3);
});

test("broadcast with no clients attempts nothing", async () => {
  const outcome = await runTest(
    Effect.gen(function* () {
      const registry = yield* makeClientRegistry();
      return yield* broadcast(registry, "frame", "process");
    })
  );
  assert.deepEqual(outcome, { attempted: 0, failed: 0 });
});
