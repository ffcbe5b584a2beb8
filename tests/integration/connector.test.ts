import test from "node:test";
import assert from "node:assert/strict";
import net from "net";
import { Effect, Queue } from "effect";
import type { ActivityCmd } from "../../src/cmd/types.js";
import { ConfigForTest, DEFAULT_WELCOME, withOverrides } from "../../src/config/index.js";
import { startConnector } from "../../src/connector/index.js";
import { runBridge, startBridge } from "../../src/server.js";
import { launchWebSocketTransport } from "../../src/transport/websocket.js";
import type { ProcessDetectedEvent, SocketCommand } from "../../src/types.js";
import { makeHarness, openSocket, waitFor } from "./harness.js";

const GAME_PAYLOAD =
  '{"activity":{"application_id":"500","name":"Test Game","timestamps":{"start":"1700"},"type":0,"metadata":{},"flags":0},"pid":31,"socketId":"500"}';

async function startStack() {
  const harness = await makeHarness();
  const stack = await harness.run(
    Effect.gen(function* () {
      const ipc = yield* Queue.unbounded<ActivityCmd>();
      const process = yield* Queue.unbounded<ProcessDetectedEvent>();
      const socket = yield* Queue.unbounded<SocketCommand>();
      const transport = yield* launchWebSocketTransport({ host: "127.0.0.1", port: 0 });
      const connector = yield* startConnector(
        transport,
        { ipc, process, socket },
        { welcome: DEFAULT_WELCOME, failFast: false }
      );
      return { ipc, process, socket, connector, url: `ws://127.0.0.1:${transport.port}` };
    })
  );
  const clientCount = (count: number) => async () =>
    (await harness.run(stack.connector.registry.size)) === count;
  return { harness, ...stack, clientCount };
}

test("a client sees welcome, process presence, echo and clear in order", { timeout: 10000 }, async () => {
  const stack = await startStack();
  try {
    const client = await openSocket(stack.url);
    assert.equal(await client.nth(0), DEFAULT_WELCOME);
    await waitFor(stack.clientCount(1));

    await stack.harness.run(
      Queue.offer(stack.process, { id: "500", name: "Test Game", timestamp: "1700", pid: 31 })
    );
    assert.equal(await client.nth(1), GAME_PAYLOAD);

    client.socket.send("hello");
    assert.equal(await client.nth(2), "hello");

    await stack.harness.run(Queue.offer(stack.process, { id: "null", name: "" }));
    assert.equal(await client.nth(3), '{"activity":null,"pid":31,"socketId":"500"}');

    await client.close();
    await waitFor(stack.clientCount(0));
    assert.equal(client.messages.length, 4);
  } finally {
    await stack.harness.close();
  }
});

test("every connected client receives producer broadcasts", { timeout: 10000 }, async () => {
  const stack = await startStack();
  try {
    const first = await openSocket(stack.url);
    const second = await openSocket(stack.url);
    await waitFor(stack.clientCount(2));

    await stack.harness.run(
      Queue.offer(stack.ipc, {
        cmd: "SET_ACTIVITY",
        application_id: "app-1",
        args: { pid: 4, activity: { name: "Editing" } },
      })
    );
    await stack.harness.run(Queue.offer(stack.socket, { cmd: "DISPATCH", evt: "PING" }));

    const expected = [
      DEFAULT_WELCOME,
      '{"activity":{"name":"Editing","type":0,"flags":0,"application_id":"app-1"},"pid":4,"socketId":"4"}',
    ];
    for (const client of [first, second]) {
      assert.equal(await client.nth(0), expected[0]);
      const rest = [await client.nth(1), await client.nth(2)].sort();
      assert.deepEqual(rest, [expected[1], '{"cmd":"DISPATCH","evt":"PING"}'].sort());
    }

    await first.close();
    await second.close();
  } finally {
    await stack.harness.close();
  }
});

test("status reports clients and the active session", { timeout: 10000 }, async () => {
  const stack = await startStack();
  try {
    const client = await openSocket(stack.url);
    await waitFor(stack.clientCount(1));
    await stack.harness.run(
      Queue.offer(stack.process, { id: "500", name: "Test Game", timestamp: "1700", pid: 31 })
    );
    await client.nth(1);

    const status = await stack.harness.run(stack.connector.status);
    assert.deepEqual(status, { clients: 1, activeSession: "500", lastProcessId: 31 });
    await client.close();
  } finally {
    await stack.harness.close();
  }
});

test("the bridge serves /health and /api/state beside the client socket", { timeout: 10000 }, async () => {
  const harness = await makeHarness();
  try {
    const bridge = await harness.run(
      startBridge.pipe(
        Effect.provide(
          ConfigForTest({
            server: { host: "127.0.0.1", port: 0 },
            ipc: { enabled: false },
            rpc: { enabled: false },
            scan: { enabled: false },
          })
        )
      )
    );
    assert.equal(bridge.ipcPath, null);
    assert.equal(bridge.rpcPort, null);

    const health = await fetch(`http://127.0.0.1:${bridge.port}/health`);
    assert.deepEqual(await health.json(), { ok: true });

    const client = await openSocket(`ws://127.0.0.1:${bridge.port}`);
    assert.equal(await client.nth(0), DEFAULT_WELCOME);
    await waitFor(async () => (await harness.run(bridge.connector.registry.size)) === 1);

    const state = await fetch(`http://127.0.0.1:${bridge.port}/api/state`);
    assert.deepEqual(await state.json(), { clients: 1, activeSession: null, lastProcessId: null });
    await client.close();
  } finally {
    await harness.close();
  }
});

test("runBridge exits with status 1 when the client port is taken", { timeout: 10000 }, async () => {
  const blocker = net.createServer();
  await new Promise<void>((resolve) => blocker.listen(0, "127.0.0.1", resolve));
  const address = blocker.address();
  assert.ok(address !== null && typeof address === "object");
  try {
    const code = await runBridge(
      withOverrides({
        server: { host: "127.0.0.1", port: address.port },
        ipc: { enabled: false },
        rpc: { enabled: false },
        scan: { enabled: false },
        log: { level: "None" },
      })
    );
    assert.equal(code, 1);
  } finally {
    await new Promise<void>((resolve) => blocker.close(() => resolve()));
  }
});
