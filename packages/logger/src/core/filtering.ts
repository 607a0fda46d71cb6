import { type Severity, severityRank } from "../ports/severity"
import { VERBOSITY_THRESHOLD, type Verbosity } from "../ports/verbosity"

/**
 * Whether an event of the given severity passes the logger's filter.
 *
 * Fatal events always pass. With filtering disabled everything passes.
 */
export function shouldEmit(
  severity: Severity,
  verbosity: Verbosity,
  filteringEnabled: boolean,
): boolean {
  if (!filteringEnabled || severity === "fatal") return true

  return severityRank(severity) >= severityRank(VERBOSITY_THRESHOLD[verbosity])
}
