/**
 * Process watcher types
 */

import { Schema } from "effect"

/** Process information from ps-list */
export interface PsProcess {
  readonly pid: number
  readonly name?: string
  readonly cmd?: string
}

export const DetectableExecutableSchema = Schema.Struct({
  /** File name as it appears in the process list, e.g. `game.exe` */
  name: Schema.String,
  /** Restrict the match to one platform */
  os: Schema.optional(Schema.Literal("win32", "linux", "darwin")),
})

export const DetectableSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  executables: Schema.Array(DetectableExecutableSchema),
})

export const DetectableListSchema = Schema.Array(DetectableSchema)

export type Detectable = Schema.Schema.Type<typeof DetectableSchema>

/** A detectable seen in the latest process list */
export interface DetectedProcess {
  readonly detectable: Detectable
  readonly pid: number
}

/** First-seen times (epoch ms) of the detectables currently running */
export type FirstSeen = ReadonlyMap<string, number>
