import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError, FormatError, IoError, PathError } from "@inkwell/errors"
import { Logger } from "@inkwell/logger"
import { defaultTemplate } from "../defaults"
import { resolveTemplate } from "../load"
import {
  buildLogger,
  fromTemplate,
  fromTemplateString,
  saveTemplate,
  toTemplate,
  toTemplateString,
} from "../template"

const silent = { stderr: { write: () => true } }

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  throw new Error("Expected a throw")
}

describe("logger templates", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "inkwell-tpl-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("describes a default logger with the default template", () => {
    expect(toTemplate(new Logger(silent))).toEqual(defaultTemplate())
  })

  it("round-trips every field through JSON text", () => {
    const logFile = path.join(cwd, "app.log")
    const template = resolveTemplate([
      {
        formatter: {
          headerColorEnabled: false,
          headers: { warning: "WARN" },
          colors: { debug: "gray", fatal: "none" },
          logFormat: "%d %h %m",
          datetimeFormat: "%H:%M",
        },
        output: {
          enabled: false,
          stderr: { enabled: false },
          buffer: { enabled: true },
          file: {
            enabled: true,
            path: logFile,
            maxBufferSize: null,
            onDropPolicy: "ignore-log-file-lock",
          },
        },
        verbosity: "errors-only",
        filteringEnabled: false,
      },
    ])

    const logger = buildLogger(template, silent)
    const restored = fromTemplateString(toTemplateString(logger), silent)

    expect(toTemplate(logger)).toEqual(template)
    expect(toTemplate(restored)).toEqual(template)
  })

  it("builds a logger that behaves as configured", () => {
    const chunks: string[] = []
    const logger = fromTemplateString(
      JSON.stringify({ formatter: { headerColorEnabled: false }, verbosity: "standard" }),
      { stderr: { write: (chunk: string) => chunks.push(chunk) } },
    )

    logger.debug("x")
    logger.info("y")
    logger.error("z")

    expect(chunks.join("")).toBe("[INF] y\n[ERR] z\n")
  })

  it("rejects a log format without %m with ConfigError caused by FormatError", () => {
    const err = thrown(() => fromTemplateString('{"formatter":{"logFormat":"[%h]"}}', silent))

    expect(err).toBeInstanceOf(ConfigError)
    expect(err instanceof ConfigError && err.cause).toBeInstanceOf(FormatError)
  })

  it("rejects an unwritable log file with ConfigError caused by PathError", () => {
    const template = resolveTemplate([
      { output: { file: { enabled: true, path: path.join(cwd, "missing", "app.log") } } },
    ])

    const err = thrown(() => buildLogger(template, silent))

    expect(err).toBeInstanceOf(ConfigError)
    expect(err instanceof ConfigError && err.cause).toBeInstanceOf(PathError)
  })

  it("rejects malformed JSON text", () => {
    expect(() => fromTemplateString("{", silent)).toThrow(ConfigError)
  })

  it("saves a template file and loads it back", async () => {
    const file = path.join(cwd, "logger.json")
    const logger = new Logger(silent, { verbosity: "quiet", formatter: { logFormat: "%m" } })

    await saveTemplate(logger, file)

    const text = await fs.readFile(file, "utf-8")
    expect(text).toBe(`${toTemplateString(logger)}\n`)

    const loaded = await fromTemplate(file, silent)

    expect(toTemplate(loaded)).toEqual(toTemplate(logger))
  })

  it("applies overrides over the template file", async () => {
    const file = path.join(cwd, "logger.json")

    await saveTemplate(new Logger(silent, { verbosity: "quiet" }), file)

    const loaded = await fromTemplate(file, silent, {
      verbosity: "all",
      formatter: { headers: { info: "INFO" } },
    })

    expect(loaded.getVerbosity()).toBe("all")
    expect(loaded.formatter.getHeader("info")).toBe("INFO")
    expect(loaded.formatter.getHeader("debug")).toBe("DBG")
  })

  it("rejects invalid overrides", async () => {
    const file = path.join(cwd, "logger.json")

    await saveTemplate(new Logger(silent), file)

    await expect(fromTemplate(file, silent, { verbosity: "loud" })).rejects.toBeInstanceOf(
      ConfigError,
    )
  })

  it("wraps a missing template file in ConfigError", async () => {
    const promise = fromTemplate(path.join(cwd, "missing.json"), silent)

    await expect(promise).rejects.toBeInstanceOf(ConfigError)
  })

  it("reports a failed save as IoError", async () => {
    const target = path.join(cwd, "missing", "logger.json")

    await expect(saveTemplate(new Logger(silent), target)).rejects.toBeInstanceOf(IoError)
  })
})
