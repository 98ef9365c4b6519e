import type { ConditionGate, Milliseconds } from "@palisade/core"

/**
 * Quota a guarded call consumes from each named store.
 */
export type RateLimitOperation = ConditionGate &
  Readonly<{
    storageNames: readonly string[]
    limit: number
    windowMs: Milliseconds

    keyGenerator?: string
    rateLimitResolver?: string
    rateLimitManager?: string

    /**
     * `false` turns a denial into a `denied` outcome instead of a
     * `RateLimitExceededError`.
     * @default true
     */
    throwOnExceeded?: boolean
  }>
