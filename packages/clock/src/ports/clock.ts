import type { Milliseconds } from "./time"

/**
 * Source of the timestamps stamped on log events.
 *
 * @remarks
 * Read once per logging call; formatters never read the clock themselves, so a
 * rendered line always shows the time the event was created.
 */
export interface Clock {
  /** Current time as a Date object. */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}
