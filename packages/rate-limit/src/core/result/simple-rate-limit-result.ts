import { describeKey, type Milliseconds, type ResourceKey } from "@palisade/core"
import type { RateLimitResult, RateLimitResultJson } from "../../ports/rate-limit-result"

export type RateLimitResultInit = Readonly<{
  identifier: ResourceKey
  limitName: string
  allowed: boolean
  currentCount: number
  limit: number
  windowMs: Milliseconds
  resetTime: Date
  retryAfterMs: Milliseconds
  timeZone: string
}>

export class SimpleRateLimitResult implements RateLimitResult {
  readonly identifier: ResourceKey
  readonly limitName: string
  readonly allowed: boolean
  readonly currentCount: number
  readonly limit: number
  readonly windowMs: Milliseconds
  readonly resetTime: Date
  readonly retryAfterMs: Milliseconds
  readonly timeZone: string

  constructor(init: RateLimitResultInit) {
    this.identifier = init.identifier
    this.limitName = init.limitName
    this.allowed = init.allowed
    this.currentCount = Math.min(init.currentCount, init.limit)
    this.limit = init.limit
    this.windowMs = init.windowMs
    this.resetTime = new Date(init.resetTime.getTime())
    this.retryAfterMs = Math.max(0, init.retryAfterMs)
    this.timeZone = init.timeZone
  }

  get remaining(): number {
    return Math.max(0, this.limit - this.currentCount)
  }

  get usageRatio(): number {
    return this.limit === 0 ? 1 : this.currentCount / this.limit
  }

  toJSON(): RateLimitResultJson {
    return {
      identifier: describeKey(this.identifier),
      limitName: this.limitName,
      allowed: this.allowed,
      currentCount: this.currentCount,
      limit: this.limit,
      remaining: this.remaining,
      usageRatio: this.usageRatio,
      windowMs: this.windowMs,
      resetTime: this.resetTime.toISOString(),
      retryAfterMs: this.retryAfterMs,
      timeZone: this.timeZone,
    }
  }
}
