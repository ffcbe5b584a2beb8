/**
 * Process watcher
 *
 * Polls the OS process list and reports, on every poll, which detectable is
 * running. The report is level-triggered; the connector's presence state
 * turns it into changes.
 */

import psList from "ps-list"
import { Effect, Queue, Ref, type Scope } from "effect"
import { ProcessListError, type DetectablesLoadError, describeCause } from "../errors.js"
import { recordError, withSpan } from "../observability/index.js"
import { NULL_SESSION, type ProcessDetectedEvent } from "../types.js"
import { loadDetectables } from "./detectables.js"
import { buildDetectorIndex, matchProcesses, type DetectorIndex } from "./detectors.js"
import type { Detectable, FirstSeen, PsProcess } from "./types.js"

export interface ProcessWatcherOptions {
  readonly pollMs: number
  readonly detectables: ReadonlyArray<Detectable>
  readonly platform?: NodeJS.Platform
  readonly listProcesses?: () => Promise<ReadonlyArray<PsProcess>>
  readonly now?: () => number
}

// ============================================================================
// Scan
// ============================================================================

/**
 * One poll: the first matching process wins. First-seen times survive across
 * polls while the detectable keeps running and are forgotten once it stops.
 */
export const scanOnce = (
  index: DetectorIndex,
  processes: ReadonlyArray<PsProcess>,
  firstSeen: FirstSeen,
  now: number
): readonly [ProcessDetectedEvent, FirstSeen] => {
  const matches = matchProcesses(index, processes)
  const next = new Map<string, number>()
  for (const match of matches) {
    next.set(match.detectable.id, firstSeen.get(match.detectable.id) ?? now)
  }

  const first = matches[0]
  if (!first) return [{ id: NULL_SESSION, name: "" }, next]

  const startedAt = next.get(first.detectable.id) ?? now
  return [
    {
      id: first.detectable.id,
      name: first.detectable.name,
      timestamp: String(startedAt),
      pid: first.pid,
    },
    next,
  ]
}

// ============================================================================
// Loop
// ============================================================================

export const watchProcesses = (
  queue: Queue.Enqueue<ProcessDetectedEvent>,
  options: ProcessWatcherOptions
): Effect.Effect<never> =>
  Effect.gen(function* () {
    const index = buildDetectorIndex(options.detectables, options.platform ?? process.platform)
    const listProcesses = options.listProcesses ?? (() => psList())
    const now = options.now ?? Date.now
    const firstSeen = yield* Ref.make<FirstSeen>(new Map())

    const poll = Effect.gen(function* () {
      const processes = yield* Effect.tryPromise({
        try: () => listProcesses(),
        catch: (err) => new ProcessListError({ reason: describeCause(err) }),
      })
      const event = yield* Ref.modify(firstSeen, (state) =>
        scanOnce(index, processes, state, now())
      )
      yield* Queue.offer(queue, event)
    }).pipe(
      Effect.catchTag("ProcessListError", (err) =>
        Effect.logWarning(`[process] listing failed: ${err.reason}`).pipe(
          Effect.zipRight(recordError("process_list"))
        )
      ),
      withSpan("process.poll")
    )

    return yield* Effect.forever(
      poll.pipe(Effect.zipRight(Effect.sleep(`${options.pollMs} millis`)))
    )
  })

export interface ProcessWatcherLaunchOptions {
  readonly pollMs: number
  readonly detectablePath?: string
}

export const launchProcessWatcher = (
  queue: Queue.Enqueue<ProcessDetectedEvent>,
  options: ProcessWatcherLaunchOptions
): Effect.Effect<void, DetectablesLoadError, Scope.Scope> =>
  Effect.gen(function* () {
    const detectables = yield* loadDetectables(options.detectablePath)
    yield* Effect.logInfo(
      `[process] watching for ${detectables.length} detectables every ${options.pollMs}ms`
    )
    yield* Effect.forkScoped(watchProcesses(queue, { pollMs: options.pollMs, detectables }))
  })
