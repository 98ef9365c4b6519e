import type { Milliseconds, ResourceKey } from "@palisade/core"

export type RateLimitResultJson = Readonly<{
  identifier: string
  limitName: string
  allowed: boolean
  currentCount: number
  limit: number
  remaining: number
  usageRatio: number
  windowMs: Milliseconds
  resetTime: string
  retryAfterMs: Milliseconds
  timeZone: string
}>

/**
 * Outcome of one consumption attempt against one store.
 *
 * @remarks
 * `allowed` is what the store decided, not something derived from
 * `currentCount`: the call that takes the last slot is allowed and
 * leaves `currentCount === limit`. `currentCount` never exceeds `limit`.
 */
export interface RateLimitResult {
  readonly identifier: ResourceKey
  readonly limitName: string
  readonly allowed: boolean
  readonly currentCount: number
  readonly limit: number
  readonly windowMs: Milliseconds
  readonly resetTime: Date

  /** Zero when allowed. */
  readonly retryAfterMs: Milliseconds

  /** IANA zone the store reports times in. */
  readonly timeZone: string

  readonly remaining: number

  /** `currentCount / limit`, 1 for a zero limit. */
  readonly usageRatio: number

  toJSON(): RateLimitResultJson
}
