/**
 * A source of logger template values.
 *
 * A TemplateSource only *loads* a raw, possibly partial template document. It
 * does not validate or merge.
 *
 * Sources are applied in order over the default template; later sources
 * override earlier ones, nested objects are merged key by key.
 */
export interface TemplateSource {
  /**
   * Human-readable name for error reports.
   * Example: "json:logger.json", "string", "object:overrides"
   */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
