import { ConfigError, hasErrorCode } from "@inkwell/errors"
import { z } from "zod"
import type { TemplateSource } from "../ports/source"
import { defaultTemplate } from "./defaults"
import { mergeDeep, type PlainObject } from "./merge"
import { type LoggerTemplate, loggerTemplateSchema } from "./schema"

/**
 * Validates a complete template document.
 *
 * @throws ConfigError with the zod report as cause
 */
export function parseTemplate(value: unknown): LoggerTemplate {
  const result = loggerTemplateSchema.safeParse(value)

  if (!result.success) {
    throw new ConfigError(`Logger template validation failed:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    })
  }

  return result.data
}

/** Applies partial documents over the default template and validates the result. */
export function resolveTemplate(patches: readonly PlainObject[]): LoggerTemplate {
  let merged: PlainObject = defaultTemplate()

  for (const patch of patches) merged = mergeDeep(merged, patch)

  return parseTemplate(merged)
}

/**
 * Loads every source in order and resolves them over the defaults.
 *
 * @throws ConfigError, wrapping any failure of a source as its cause
 */
export async function loadTemplate(sources: readonly TemplateSource[]): Promise<LoggerTemplate> {
  const patches: PlainObject[] = []

  for (const source of sources) {
    try {
      patches.push(await source.load())
    } catch (err) {
      if (hasErrorCode(err, "config")) throw err

      throw new ConfigError(`Failed to load template source: ${source.name}`, {
        cause: err,
        context: { source: source.name },
      })
    }
  }

  return resolveTemplate(patches)
}
