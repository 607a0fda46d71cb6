/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/** A point in time accepted wherever a clock is set. */
export type Instant = Date | Milliseconds
