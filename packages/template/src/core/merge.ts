export type PlainObject = Record<string, unknown>

export function isPlainObject(value: unknown): value is PlainObject {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

/**
 * Returns `base` with `patch` applied: nested plain objects merge key by key,
 * anything else (arrays included) replaces. `undefined` values are skipped.
 */
export function mergeDeep(base: PlainObject, patch: PlainObject): PlainObject {
  const out: PlainObject = { ...base }

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined || key === "__proto__") continue

    const current = out[key]

    out[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value
  }

  return out
}
