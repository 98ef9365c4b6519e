import type { Milliseconds, Resource, ResourceKey } from "@palisade/core"
import type { RateLimitMetrics } from "./rate-limit-metrics"
import type { RateLimitResult } from "./rate-limit-result"

/**
 * Fixed-window request counting for one named limit.
 *
 * @remarks
 * State is kept per (identifier, window length). A window starts with
 * the first request and ends at `resetTime`; once `now >= resetTime` the
 * next request starts a fresh window. Every read-then-write runs inside
 * the store's own critical section.
 */
export interface RateLimitStorage {
  readonly name: string

  /**
   * Rolls the window over when it has ended, then takes one slot if
   * `currentCount < limit`.
   *
   * @throws RangeError for a negative or fractional limit or a non-positive window.
   */
  tryConsume(identifier: ResourceKey, limit: number, windowMs: Milliseconds): Promise<RateLimitResult>

  /**
   * Gives back one slot in the current window, floored at zero. Nothing
   * happens when the window has ended, or when `resetAtMs` is given and
   * names a different window.
   *
   * @returns whether a slot was given back.
   */
  rollbackConsume(identifier: ResourceKey, windowMs: Milliseconds, resetAtMs?: Milliseconds): Promise<boolean>

  getRemainingRequests(identifier: ResourceKey, limit: number, windowMs: Milliseconds): Promise<number>

  /** Counts a request without checking a limit. */
  recordRequest(identifier: ResourceKey, windowMs: Milliseconds): Promise<void>

  /** 0 when the window is absent or has ended. */
  getRequestCount(identifier: ResourceKey, windowMs: Milliseconds): Promise<number>

  /** `undefined` when absent; now, when the window has ended. */
  getResetTime(identifier: ResourceKey, windowMs: Milliseconds): Promise<Date | undefined>

  /** `undefined` when absent or ended. */
  getRetryAfter(identifier: ResourceKey, windowMs: Milliseconds): Promise<Date | undefined>

  /** Drops every window of one identifier. */
  reset(identifier: ResourceKey): Promise<void>

  /** Drops every window and resets the metrics. */
  clear(): Promise<void>

  /** Drops ended windows only. */
  invalidate(): Promise<void>

  size(): number
  getMetrics(): RateLimitMetrics
  getResource(): Resource
}
