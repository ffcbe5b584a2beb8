import type { Detectable, DetectedProcess, PsProcess } from "./types.js"

/** Lowercased basename without a trailing `.exe` */
export const executableKey = (name: string): string => {
  const base = name.split(/[\\/]/).pop() ?? name
  return base.toLowerCase().replace(/\.exe$/, "")
}

export type DetectorIndex = ReadonlyMap<string, Detectable>

/**
 * Executable key to detectable, for the given platform. When two entries
 * claim the same executable the first one in the list wins.
 */
export const buildDetectorIndex = (
  detectables: ReadonlyArray<Detectable>,
  platform: NodeJS.Platform
): DetectorIndex => {
  const index = new Map<string, Detectable>()
  for (const detectable of detectables) {
    for (const executable of detectable.executables) {
      if (executable.os !== undefined && executable.os !== platform) continue
      const key = executableKey(executable.name)
      if (!index.has(key)) index.set(key, detectable)
    }
  }
  return index
}

const processKeys = (proc: PsProcess): string[] => {
  const keys: string[] = []
  if (proc.name) keys.push(executableKey(proc.name))
  const argv0 = proc.cmd?.trim().split(/\s+/)[0]
  if (argv0) keys.push(executableKey(argv0))
  return keys
}

/** Matches in process-list order, one per detectable */
export const matchProcesses = (
  index: DetectorIndex,
  processes: ReadonlyArray<PsProcess>
): DetectedProcess[] => {
  const seen = new Set<string>()
  const matches: DetectedProcess[] = []
  for (const proc of processes) {
    for (const key of processKeys(proc)) {
      const detectable = index.get(key)
      if (!detectable || seen.has(detectable.id)) continue
      seen.add(detectable.id)
      matches.push({ detectable, pid: proc.pid })
      break
    }
  }
  return matches
}
