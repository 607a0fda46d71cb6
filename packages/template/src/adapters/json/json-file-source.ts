import fs from "node:fs/promises"
import path from "node:path"
import { PathError } from "@inkwell/errors"
import { parseJsonObject } from "../../core/json"
import type { TemplateSource } from "../../ports/source"

export type JsonFileSourceOptions = {
  /**
   * Path to the JSON template.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "logger.json", "./config/logger.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: throws `PathError` if the file is not found.
   * - `false`: contributes nothing if the file is not found.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class JsonFileSource implements TemplateSource {
  readonly name: string

  constructor(private readonly opts: JsonFileSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}

      throw new PathError(`Template file is not readable: ${filePath}`, {
        cause: err,
        context: { path: filePath },
      })
    }

    return parseJsonObject(content, this.name)
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
