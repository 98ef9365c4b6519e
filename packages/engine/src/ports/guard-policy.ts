import type { CachePolicy } from "@palisade/cache"
import type { RateLimitOperation } from "@palisade/rate-limit"

/**
 * What a guarded function is subject to. Either half may be left out.
 */
export type GuardPolicy<R> = {
  cache?: CachePolicy<R>
  rateLimit?: RateLimitOperation
}

export type GuardOptions = {
  /** Passed as `this` and exposed to key generators. */
  target?: object

  /** Method name seen by key generators and logs; defaults to the function's name. */
  name?: string
}
