import { createLogEvent } from "../log-event"
import type { OutputStream } from "../output-stream"
import type { LogRenderer } from "../renderer"

export type OutputStreamHarness = {
  name: string
  /** The returned stream must be able to enable. */
  make: () => {
    stream: OutputStream
    /** Messages delivered so far, in order. */
    read: () => string[]
  }
}

const messageOnly: LogRenderer = { render: (event) => event.message }

const at = new Date(2024, 0, 2, 3, 4, 5)

export function describeOutputStreamContract(h: OutputStreamHarness) {
  describe(`OutputStream contract: ${h.name}`, () => {
    it("has a name", () => {
      const { stream } = h.make()

      expect(stream.name.length).toBeGreaterThan(0)
    })

    it("enable() and disable() toggle isEnabled()", () => {
      const { stream } = h.make()

      stream.enable()
      expect(stream.isEnabled()).toBe(true)

      stream.disable()
      expect(stream.isEnabled()).toBe(false)
    })

    it("ignores events while disabled", () => {
      const { stream, read } = h.make()

      stream.disable()
      stream.out(createLogEvent("error", "dropped", at), messageOnly)

      expect(read()).toEqual([])
    })

    it("delivers events in call order while enabled", () => {
      const { stream, read } = h.make()

      stream.enable()
      stream.out(createLogEvent("info", "first", at), messageOnly)
      stream.out(createLogEvent("warning", "second", at), messageOnly)
      stream.out(createLogEvent("error", "third", at), messageOnly)

      expect(read()).toEqual(["first", "second", "third"])
    })

    it("resumes delivery after being re-enabled", () => {
      const { stream, read } = h.make()

      stream.enable()
      stream.out(createLogEvent("info", "before", at), messageOnly)
      stream.disable()
      stream.out(createLogEvent("info", "while-off", at), messageOnly)
      stream.enable()
      stream.out(createLogEvent("info", "after", at), messageOnly)

      expect(read()).toEqual(["before", "after"])
    })
  })
}
