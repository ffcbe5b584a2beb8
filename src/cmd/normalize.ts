/**
 * Default-filling for activity commands.
 *
 * Applied to every SET_ACTIVITY command before the connector builds a
 * payload from it. Field by field:
 *
 * | field                         | input                      | output                              |
 * |-------------------------------|----------------------------|-------------------------------------|
 * | `args.pid`                    | `null` or non-finite       | removed                             |
 * | `args.activity.buttons`       | `{ label, url }[]`         | `label[]`                           |
 * | `args.activity.metadata`      | (buttons given as objects) | `button_urls: url[]` merged in      |
 * | `args.activity.flags`         | `instance` present         | `instance ? 1 : 0`                  |
 * | `args.activity.flags`         | both absent                | `0`                                 |
 * | `args.activity.type`          | absent                     | `0`                                 |
 * | `args.activity.timestamps.*`  | numeric, in seconds        | milliseconds                        |
 */

import type { Activity, ActivityButton, ActivityCmd } from "./types.js"

// ============================================================================
// Field Helpers
// ============================================================================

const INSTANCE_FLAG = 1 << 0

const isButtonObjects = (
  buttons: Activity["buttons"]
): buttons is ReadonlyArray<ActivityButton> =>
  Array.isArray(buttons) && buttons.length > 0 && typeof buttons[0] === "object"

/** Seconds-precision timestamps are 3 digits shorter than Date.now() */
const toMillis = (value: number | string | undefined, now: number): number | string | undefined => {
  if (typeof value !== "number" || !Number.isFinite(value)) return value
  const digitsShort = String(Math.floor(now)).length - String(Math.floor(value)).length
  return digitsShort > 2 ? Math.floor(value * 1000) : value
}

const normalizeTimestamps = (
  timestamps: Activity["timestamps"],
  now: number
): Activity["timestamps"] => {
  if (!timestamps) return timestamps
  const next: { start?: number | string; end?: number | string } = {}
  if (timestamps.start !== undefined) next.start = toMillis(timestamps.start, now)
  if (timestamps.end !== undefined) next.end = toMillis(timestamps.end, now)
  return next
}

const resolveFlags = (activity: Activity): number => {
  if (activity.instance !== undefined) return activity.instance ? INSTANCE_FLAG : 0
  return activity.flags ?? 0
}

// ============================================================================
// Normalization
// ============================================================================

export const normalizeActivity = (activity: Activity, now: number = Date.now()): Activity => {
  let next: Activity = {
    ...activity,
    type: activity.type ?? 0,
    flags: resolveFlags(activity),
  }

  const timestamps = normalizeTimestamps(activity.timestamps, now)
  if (timestamps) next = { ...next, timestamps }

  if (isButtonObjects(activity.buttons)) {
    next = {
      ...next,
      buttons: activity.buttons.map((button) => button.label),
      metadata: {
        ...activity.metadata,
        button_urls: activity.buttons.map((button) => button.url),
      },
    }
  }

  return next
}

export const normalizeActivityCmd = (cmd: ActivityCmd, now: number = Date.now()): ActivityCmd => {
  const args = cmd.args
  if (!args) return cmd

  const pid = typeof args.pid === "number" && Number.isFinite(args.pid) ? args.pid : undefined
  const activity = args.activity ? normalizeActivity(args.activity, now) : args.activity

  const nextArgs: { pid?: number; activity?: Activity | null } = {}
  if (pid !== undefined) nextArgs.pid = pid
  if (activity !== undefined) nextArgs.activity = activity

  return { ...cmd, args: nextArgs }
}
