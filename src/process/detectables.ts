import fs from "fs"
import { fileURLToPath } from "url"
import { Effect, ParseResult, Schema } from "effect"
import { DetectablesLoadError, describeCause } from "../errors.js"
import { DetectableListSchema, type Detectable } from "./types.js"

export const defaultDetectablesPath = fileURLToPath(
  new URL("../../data/detectables.json", import.meta.url)
)

export const loadDetectables = (
  path: string = defaultDetectablesPath
): Effect.Effect<ReadonlyArray<Detectable>, DetectablesLoadError> =>
  Effect.gen(function* () {
    const raw = yield* Effect.tryPromise({
      try: () => fs.promises.readFile(path, "utf8"),
      catch: (err) => new DetectablesLoadError({ path, reason: describeCause(err) }),
    })
    const json = yield* Effect.try({
      try: (): unknown => JSON.parse(raw),
      catch: (err) => new DetectablesLoadError({ path, reason: describeCause(err) }),
    })
    return yield* Schema.decodeUnknown(DetectableListSchema)(json).pipe(
      Effect.mapError(
        (err) =>
          new DetectablesLoadError({
            path,
            reason: ParseResult.TreeFormatter.formatErrorSync(err),
          })
      )
    )
  })
