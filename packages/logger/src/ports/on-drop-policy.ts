export const onDropPolicies = ["ignore-log-file-lock", "discard-log-buffer"] as const

/**
 * What a file output does with pending lines when it is closed while locked.
 *
 * - `ignore-log-file-lock`: write them anyway
 * - `discard-log-buffer`: drop them
 */
export type OnDropPolicy = (typeof onDropPolicies)[number]

export const DEFAULT_ON_DROP_POLICY: OnDropPolicy = "discard-log-buffer"

export function isOnDropPolicy(value: unknown): value is OnDropPolicy {
  return typeof value === "string" && onDropPolicies.some((name) => name === value)
}
