export const severityNames = ["debug", "info", "warning", "error", "fatal"] as const

export type Severity = (typeof severityNames)[number]

/**
 * Rank of each severity (higher = more important).
 *
 * These values define the ordering used by verbosity filtering.
 */
export const SeverityRanks = {
  /** Detailed information useful during development. */
  debug: 0,
  /** Normal operation. */
  info: 1,
  /** Something unexpected that the program recovered from. */
  warning: 2,
  /** A failure of the current operation. */
  error: 3,
  /** A failure after which the program cannot continue. */
  fatal: 4,
} as const satisfies Record<Severity, number>

export function severityRank(severity: Severity): number {
  return SeverityRanks[severity]
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && severityNames.some((name) => name === value)
}
