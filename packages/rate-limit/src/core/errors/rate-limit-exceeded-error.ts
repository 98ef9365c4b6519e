import { describeDuration, describeKey, ResourceError } from "@palisade/core"
import type { RateLimitResult } from "../../ports/rate-limit-result"

export type RateLimitHeaders = Readonly<{
  "X-RateLimit-Limit": string
  "X-RateLimit-Remaining": string
  "X-RateLimit-Reset": string
  "Retry-After": string
  "X-RateLimit-Name": string
  "X-RateLimit-Window": string
}>

/**
 * A store denied a consumption.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (err instanceof RateLimitExceededError) {
 *     res.writeHead(429, err.toHttpHeaders())
 *   }
 * }
 * ```
 */
export class RateLimitExceededError extends ResourceError<"rate_limit_exceeded"> {
  constructor(readonly result: RateLimitResult) {
    const { limitName, currentCount, limit, windowMs, retryAfterMs } = result

    super(
      `Rate limit exceeded for "${describeKey(result.identifier)}" on "${limitName}": ` +
        `${currentCount}/${limit} requests per ${describeDuration(windowMs)}. ` +
        `Retry after ${describeDuration(retryAfterMs)}.`,
      {
        code: "rate_limit_exceeded",
        context: result.toJSON(),
        isRetryable: true,
      },
    )
  }

  get usageRatio(): number {
    return this.result.usageRatio
  }

  get isFullyExhausted(): boolean {
    return this.result.remaining === 0
  }

  toHttpHeaders(): RateLimitHeaders {
    const { limit, remaining, resetTime, retryAfterMs, limitName, windowMs } = this.result

    return {
      "X-RateLimit-Limit": String(limit),
      "X-RateLimit-Remaining": String(remaining),
      "X-RateLimit-Reset": String(resetTime.getTime()),
      "Retry-After": String(Math.ceil(retryAfterMs / 1000)),
      "X-RateLimit-Name": limitName,
      "X-RateLimit-Window": String(Math.floor(windowMs / 1000)),
    }
  }
}
