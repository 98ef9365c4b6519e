import type { Milliseconds, ResourceKey } from "@palisade/core"

export type CacheEvictionReason = "manual" | "eviction-policy"

type CacheEventBase = Readonly<{
  cacheName: string
  key: ResourceKey
  timestamp: Date
}>

export type CacheHitEvent = CacheEventBase & Readonly<{ type: "hit"; value: unknown }>

export type CacheMissEvent = CacheEventBase & Readonly<{ type: "miss" }>

export type CachePutEvent = CacheEventBase &
  Readonly<{ type: "put"; value: unknown; ttlMs: Milliseconds | undefined }>

export type CacheEvictEvent = CacheEventBase &
  Readonly<{ type: "evict"; reason: CacheEvictionReason }>

export type CacheExpireEvent = CacheEventBase &
  Readonly<{ type: "expire"; value: unknown; ttlMs: Milliseconds | undefined }>

/** One per key that was present, `count` is the total removed. */
export type CacheClearEvent = CacheEventBase & Readonly<{ type: "clear"; count: number }>

export type CacheEvent =
  | CacheHitEvent
  | CacheMissEvent
  | CachePutEvent
  | CacheEvictEvent
  | CacheExpireEvent
  | CacheClearEvent
