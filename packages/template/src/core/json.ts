import { ConfigError } from "@inkwell/errors"
import { isPlainObject, type PlainObject } from "./merge"

/** Parses a template document; the top level must be a JSON object. */
export function parseJsonObject(text: string, source: string): PlainObject {
  let value: unknown

  try {
    value = JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`Template is not valid JSON: ${source}`, {
      cause: err,
      context: { source },
    })
  }

  if (!isPlainObject(value)) {
    throw new ConfigError(`Template must be a JSON object: ${source}`, {
      context: { source },
    })
  }

  return value
}
