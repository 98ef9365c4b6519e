import { ManualClock } from "@palisade/core"
import { SimpleRateLimitMetrics } from "../simple-rate-limit-metrics"

const START = Date.UTC(2025, 0, 1)

describe("SimpleRateLimitMetrics", () => {
  let clock: ManualClock
  let metrics: SimpleRateLimitMetrics

  beforeEach(() => {
    clock = new ManualClock(START)
    metrics = new SimpleRateLimitMetrics("api", clock)
  })

  it("starts empty with no update time", () => {
    expect(metrics.totals()).toStrictEqual({ allowed: 0, denied: 0, resets: 0 })
    expect(metrics.lastUpdated()).toBeUndefined()
    expect(metrics.buildGraph().lastUpdated).toBeNull()
  })

  it("sums counters across identifiers", () => {
    metrics.recordAllowed("a")
    metrics.recordAllowed("b")
    metrics.recordDenied("a")
    metrics.recordReset("b")

    expect(metrics.totals()).toStrictEqual({ allowed: 2, denied: 1, resets: 1 })
  })

  it("stamps the last change", () => {
    metrics.recordAllowed("a")
    clock.advance(500)
    metrics.recordDenied("a")

    expect(metrics.lastUpdated()).toStrictEqual(new Date(START + 500))
  })

  it("never takes an allowed count below zero", () => {
    metrics.recordAllowed("a")

    metrics.decrementAllowed("a")
    metrics.decrementAllowed("a")
    metrics.decrementAllowed("b")

    expect(metrics.totals().allowed).toBe(0)
  })

  it("builds a graph with per-identifier counts", () => {
    metrics.recordAllowed("a")
    metrics.recordAllowed("a")
    metrics.recordDenied("b")

    expect(metrics.buildGraph()).toStrictEqual({
      limitName: "api",
      lastUpdated: "2025-01-01T00:00:00.000Z",
      totals: { allowed: 2, denied: 1, resets: 0 },
      identifiers: { allowed: { a: 2 }, denied: { b: 1 }, resets: {} },
    })
  })

  it("reset clears the counts and stamps the time", () => {
    metrics.recordAllowed("a")
    clock.advance(1_000)

    metrics.reset()

    expect(metrics.totals()).toStrictEqual({ allowed: 0, denied: 0, resets: 0 })
    expect(metrics.lastUpdated()).toStrictEqual(new Date(START + 1_000))
  })
})
