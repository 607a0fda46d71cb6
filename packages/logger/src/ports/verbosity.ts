import type { Severity } from "./severity"

export const verbosityNames = ["all", "standard", "quiet", "errors-only"] as const

export type Verbosity = (typeof verbosityNames)[number]

/** Lowest severity each verbosity lets through while filtering is enabled. */
export const VERBOSITY_THRESHOLD: Readonly<Record<Verbosity, Severity>> = {
  all: "debug",
  standard: "info",
  quiet: "warning",
  "errors-only": "error",
}

export const DEFAULT_VERBOSITY: Verbosity = "standard"

export function isVerbosity(value: unknown): value is Verbosity {
  return typeof value === "string" && verbosityNames.some((name) => name === value)
}
