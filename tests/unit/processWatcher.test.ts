import test from "node:test";
import assert from "node:assert/strict";
import { Effect, Queue } from "effect";
import {
  buildDetectorIndex,
  executableKey,
  matchProcesses,
} from "../../src/process/detectors.js";
import { scanOnce, watchProcesses } from "../../src/process/watcher.js";
import type { Detectable, PsProcess } from "../../src/process/types.js";
import type { ProcessDetectedEvent } from "../../src/types.js";
import { runScoped } from "./support.js";

const detectables: Detectable[] = [
  {
    id: "100",
    name: "Starfall Outpost",
    executables: [{ name: "starfall.exe" }, { name: "starfall", os: "linux" }],
  },
  {
    id: "200",
    name: "Pixel Harbor",
    executables: [{ name: "pixelharbor.exe", os: "win32" }],
  },
  {
    id: "300",
    name: "Tidepool Racing",
    executables: [{ name: "bin/tidepool" }],
  },
];

test("executableKey lowercases the basename and strips .exe", () => {
  assert.equal(executableKey("C:\\Games\\Starfall.EXE"), "starfall");
  assert.equal(executableKey("/opt/games/tidepool"), "tidepool");
  assert.equal(executableKey("launcher.exe.bak"), "launcher.exe.bak");
});

test("buildDetectorIndex skips executables for other platforms", () => {
  const linux = buildDetectorIndex(detectables, "linux");
  assert.deepEqual([...linux.keys()].sort(), ["starfall", "tidepool"]);

  const windows = buildDetectorIndex(detectables, "win32");
  assert.deepEqual([...windows.keys()].sort(), ["pixelharbor", "starfall", "tidepool"]);
});

test("matchProcesses reports each detectable once, in process order", () => {
  const index = buildDetectorIndex(detectables, "linux");
  const processes: PsProcess[] = [
    { pid: 10, name: "bash" },
    { pid: 11, name: "tidepool" },
    { pid: 12, name: "Starfall" },
    { pid: 13, name: "starfall" },
  ];

  const matches = matchProcesses(index, processes);
  assert.deepEqual(
    matches.map((match) => [match.detectable.id, match.pid]),
    [
      ["300", 11],
      ["100", 12],
    ]
  );
});

test("matchProcesses falls back to the command's first word", () => {
  const index = buildDetectorIndex(detectables, "linux");
  const matches = matchProcesses(index, [
    { pid: 20, name: "wine64-preloader", cmd: "/home/u/games/starfall.exe --windowed" },
  ]);
  assert.deepEqual(
    matches.map((match) => match.detectable.id),
    ["100"]
  );
});

test("scanOnce reports null when nothing runs", () => {
  const index = buildDetectorIndex(detectables, "linux");
  const [event, firstSeen] = scanOnce(index, [{ pid: 1, name: "init" }], new Map(), 1000);
  assert.deepEqual(event, { id: "null", name: "" });
  assert.equal(firstSeen.size, 0);
});

test("scanOnce keeps the first-seen time while the process keeps running", () => {
  const index = buildDetectorIndex(detectables, "linux");
  const running: PsProcess[] = [{ pid: 42, name: "starfall" }];

  const [first, seen] = scanOnce(index, running, new Map(), 1000);
  const [second, seenAgain] = scanOnce(index, running, seen, 6000);
  const [stopped, cleared] = scanOnce(index, [], seenAgain, 11000);
  const [restarted] = scanOnce(index, running, cleared, 16000);

  assert.deepEqual(first, { id: "100", name: "Starfall Outpost", timestamp: "1000", pid: 42 });
  assert.deepEqual(second, first);
  assert.deepEqual(stopped, { id: "null", name: "" });
  assert.equal(restarted.timestamp, "16000");
});

test("watchProcesses polls and keeps going after a listing failure", async () => {
  let calls = 0;
  const listProcesses = async (): Promise<PsProcess[]> => {
    calls += 1;
    if (calls === 1) throw new Error("ps unavailable");
    return [{ pid: 7, name: "starfall" }];
  };

  const events = await runScoped(
    Effect.gen(function* () {
      const queue = yield* Queue.unbounded<ProcessDetectedEvent>();
      yield* Effect.forkScoped(
        watchProcesses(queue, {
          pollMs: 5,
          detectables,
          platform: "linux",
          listProcesses,
          now: () => 5000,
        })
      );
      const first = yield* Queue.take(queue);
      const second = yield* Queue.take(queue);
      return [first, second];
    })
  );

  assert.ok(calls >= 3);
  assert.deepEqual(events, [
    { id: "100", name: "Starfall Outpost", timestamp: "5000", pid: 7 },
    { id: "100", name: "Starfall Outpost", timestamp: "5000", pid: 7 },
  ]);
});
