import { Writable } from "node:stream"
import { IoError } from "@inkwell/errors"
import pino from "pino"
import { PinoDiagnostics } from "../pino-diagnostics"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoDiagnostics behavior", () => {
  it("writes warnings as JSON with the default bindings", () => {
    const { lines, destination } = makeLineDestination()
    const diagnostics = new PinoDiagnostics({ destination })

    diagnostics.warn("Discarded buffered log lines", { stream: "file", discarded: 5 })

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      level: 40,
      msg: "Discarded buffered log lines",
      component: "inkwell",
      stream: "file",
      discarded: 5,
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const diagnostics = new PinoDiagnostics({ destination, bindings: {} })
    const cause = new Error("ENOSPC")
    const err = new IoError("Failed to write log buffer to file", { cause })

    diagnostics.error("Failed to write buffered log lines on close", { err })

    const entry = parse(lines[0])

    expect(entry.level).toBe(50)
    expect(entry.err).toMatchObject({
      type: "IoError",
      message: "Failed to write log buffer to file",
      code: "io",
      cause: { type: "Error", message: "ENOSPC" },
    })
  })

  it("drops entries below the configured level", () => {
    const { lines, destination } = makeLineDestination()
    const diagnostics = new PinoDiagnostics({ destination, level: "error" })

    diagnostics.warn("ignored")
    diagnostics.error("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0]).msg).toBe("kept")
  })

  it("uses a provided base logger", () => {
    const { lines, destination } = makeLineDestination()
    const base = pino({ level: "warn" }, destination)
    const diagnostics = new PinoDiagnostics({ bindings: { app: "billing" } }, base)

    diagnostics.warn("w")

    expect(parse(lines[0])).toMatchObject({ app: "billing", msg: "w" })
  })
})
