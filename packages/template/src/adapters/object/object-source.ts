import type { TemplateSource } from "../../ports/source"

export class ObjectSource implements TemplateSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "object:overrides",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.obj)
  }
}
