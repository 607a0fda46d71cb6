import { describe, expect, it } from "vitest"
import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    it("now() returns a valid Date", () => {
      const clock = h.make()
      const result = clock.now()

      expect(result).toBeInstanceOf(Date)
      expect(Number.isNaN(result.getTime())).toBe(false)
    })

    it("nowMs() returns a finite number", () => {
      const clock = h.make()

      expect(Number.isFinite(clock.nowMs())).toBe(true)
    })

    it("now() and nowMs() are consistent", () => {
      const clock = h.make()
      const date = clock.now()
      const ms = clock.nowMs()

      expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
    })

    it("time never goes backwards between reads", () => {
      const clock = h.make()
      const first = clock.nowMs()
      const second = clock.nowMs()

      expect(second).toBeGreaterThanOrEqual(first)
    })
  })
}
