export type RateLimitCounter = "allowed" | "denied" | "resets"

export type RateLimitMetricTotals = Readonly<Record<RateLimitCounter, number>>

export type RateLimitMetricsGraph = Readonly<{
  limitName: string

  /** ISO timestamp of the last recorded change, `null` before the first. */
  lastUpdated: string | null
  totals: RateLimitMetricTotals

  /** Per-identifier counts, identifiers rendered with `describeKey`. */
  identifiers: Readonly<Record<RateLimitCounter, Readonly<Record<string, number>>>>
}>

export interface RateLimitMetrics {
  recordAllowed(identifier: string): void
  recordDenied(identifier: string): void
  recordReset(identifier: string): void

  /** Takes back one allowed request after a rollback; never goes below zero. */
  decrementAllowed(identifier: string): void

  totals(): RateLimitMetricTotals
  lastUpdated(): Date | undefined
  reset(): void
  buildGraph(): RateLimitMetricsGraph
}
