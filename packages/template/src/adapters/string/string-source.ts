import { parseJsonObject } from "../../core/json"
import type { TemplateSource } from "../../ports/source"

/** A template held in memory as JSON text. */
export class StringSource implements TemplateSource {
  readonly name: string

  constructor(
    private readonly text: string,
    name = "string",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return this.read()
  }

  /** Parses the text synchronously. @throws ConfigError */
  read(): Record<string, unknown> {
    return parseJsonObject(this.text, this.name)
  }
}
