import type { ConditionGate, Milliseconds } from "@palisade/core"

type CacheOperationBase = ConditionGate &
  Readonly<{
    cacheNames: readonly string[]

    /** Registered key generator to use instead of the default one. */
    keyGenerator?: string

    /** Registered resolver that fully decides which caches take part. */
    cacheResolver?: string

    /** Registered manager whose every cache takes part. */
    cacheManager?: string
  }>

/**
 * Serve from the first cache holding the key; otherwise call through and
 * store the result.
 */
export type ReadThroughOperation<R> = CacheOperationBase &
  Readonly<{
    kind: "read-through"

    /**
     * Checks that a cached value has the type the call returns. A value
     * it rejects is treated as a miss for that cache.
     */
    accepts: (value: unknown) => value is R
    ttlMs?: Milliseconds
  }>

/** Always call through, then store the result in every cache. */
export type WriteThroughOperation = CacheOperationBase &
  Readonly<{
    kind: "write-through"
    ttlMs?: Milliseconds
  }>

/** Remove the call's key, or every entry, from each cache. */
export type InvalidateOperation = CacheOperationBase &
  Readonly<{
    kind: "invalidate"
    allEntries?: boolean

    /** Run before the call instead of after it returns. */
    beforeInvocation?: boolean
  }>

export type CacheOperationSpec =
  | ReadThroughOperation<unknown>
  | WriteThroughOperation
  | InvalidateOperation

/**
 * Everything the cache pipeline does around one guarded call.
 */
export type CachePolicy<R> = Readonly<{
  readThrough?: ReadThroughOperation<R>
  writeThrough?: WriteThroughOperation
  invalidate?: InvalidateOperation
}>
