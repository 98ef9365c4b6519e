import type { Clock } from "@palisade/core"
import type {
  RateLimitCounter,
  RateLimitMetrics,
  RateLimitMetricsGraph,
  RateLimitMetricTotals,
} from "../../ports/rate-limit-metrics"

export class SimpleRateLimitMetrics implements RateLimitMetrics {
  private readonly perIdentifier = new Map<RateLimitCounter, Map<string, number>>()
  private updatedAt: Date | undefined

  constructor(
    readonly limitName: string,
    private readonly clock: Clock,
  ) {}

  recordAllowed(identifier: string): void {
    this.add("allowed", identifier, 1)
  }

  recordDenied(identifier: string): void {
    this.add("denied", identifier, 1)
  }

  recordReset(identifier: string): void {
    this.add("resets", identifier, 1)
  }

  decrementAllowed(identifier: string): void {
    const counts = this.perIdentifier.get("allowed")
    const current = counts?.get(identifier) ?? 0

    if (!counts || current === 0) return

    counts.set(identifier, current - 1)
    this.updatedAt = this.clock.now()
  }

  totals(): RateLimitMetricTotals {
    return {
      allowed: this.total("allowed"),
      denied: this.total("denied"),
      resets: this.total("resets"),
    }
  }

  lastUpdated(): Date | undefined {
    return this.updatedAt
  }

  reset(): void {
    this.perIdentifier.clear()
    this.updatedAt = this.clock.now()
  }

  buildGraph(): RateLimitMetricsGraph {
    return {
      limitName: this.limitName,
      lastUpdated: this.updatedAt?.toISOString() ?? null,
      totals: this.totals(),
      identifiers: {
        allowed: Object.fromEntries(this.perIdentifier.get("allowed") ?? []),
        denied: Object.fromEntries(this.perIdentifier.get("denied") ?? []),
        resets: Object.fromEntries(this.perIdentifier.get("resets") ?? []),
      },
    }
  }

  private add(counter: RateLimitCounter, identifier: string, n: number): void {
    let counts = this.perIdentifier.get(counter)

    if (!counts) {
      counts = new Map()
      this.perIdentifier.set(counter, counts)
    }

    counts.set(identifier, (counts.get(identifier) ?? 0) + n)
    this.updatedAt = this.clock.now()
  }

  private total(counter: RateLimitCounter): number {
    let sum = 0

    for (const n of this.perIdentifier.get(counter)?.values() ?? []) sum += n

    return sum
  }
}
