import type { Clock } from "../ports/clock"
import type { Instant, Milliseconds } from "../ports/time"

export type FakeClockOptions = {
  /** Advance the clock by this much after every read. Default: 0 */
  step?: Milliseconds
}

export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly step: Milliseconds

  constructor(start: Instant = 0, opts: FakeClockOptions = {}) {
    this.time = toMs(start)
    this.step = opts.step ?? 0
  }

  now(): Date {
    return new Date(this.read())
  }

  nowMs(): Milliseconds {
    return this.read()
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(instant: Instant): void {
    this.time = toMs(instant)
  }

  private read(): Milliseconds {
    const current = this.time
    this.time = current + this.step
    return current
  }
}

function toMs(instant: Instant): Milliseconds {
  return instant instanceof Date ? instant.getTime() : instant
}
