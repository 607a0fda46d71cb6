import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError, PathError } from "@inkwell/errors"
import { JsonFileSource } from "../json-file-source"

describe("JsonFileSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "inkwell-json-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("is named after the file", () => {
    expect(new JsonFileSource({ file: "logger.json", required: true }).name).toBe(
      "json:logger.json",
    )
  })

  it("throws PathError for a missing required file", async () => {
    const source = new JsonFileSource({ file: "missing.json", required: true, cwd })

    await expect(source.load()).rejects.toBeInstanceOf(PathError)
  })

  it("contributes nothing for a missing optional file", async () => {
    const source = new JsonFileSource({ file: "missing.json", required: false, cwd })

    await expect(source.load()).resolves.toEqual({})
  })

  it("throws ConfigError for malformed JSON", async () => {
    await fs.writeFile(path.join(cwd, "logger.json"), "{ verbosity: ")
    const source = new JsonFileSource({ file: "logger.json", required: true, cwd })

    await expect(source.load()).rejects.toBeInstanceOf(ConfigError)
  })

  it("throws ConfigError when the document is not an object", async () => {
    await fs.writeFile(path.join(cwd, "logger.json"), "[1, 2]")
    const source = new JsonFileSource({ file: "logger.json", required: false, cwd })

    await expect(source.load()).rejects.toThrow("Template must be a JSON object: json:logger.json")
  })

  it("accepts an absolute path", async () => {
    const file = path.join(cwd, "abs.json")
    await fs.writeFile(file, JSON.stringify({ filteringEnabled: false }))

    const source = new JsonFileSource({ file, required: true })

    await expect(source.load()).resolves.toEqual({ filteringEnabled: false })
  })
})
