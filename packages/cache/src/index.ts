export {
  MemoryCacheStorage,
  type MemoryCacheStorageDeps,
  type MemoryCacheStorageOptions,
} from "./adapters/memory/memory-cache-storage"
export { StoredCacheEntry } from "./core/entry/stored-cache-entry"
export { LoggingCacheErrorHandler } from "./core/error-handler/logging-cache-error-handler"
export { ThrowingCacheErrorHandler } from "./core/error-handler/throwing-cache-error-handler"
export { CacheCapacityExceededError, CacheEntryNotFoundError } from "./core/errors/cache-errors"
export {
  createEvictionPolicy,
  evictionPolicyNames,
  isEvictionPolicyName,
} from "./core/eviction/create-eviction-policy"
export { FifoEvictionPolicy } from "./core/eviction/fifo-eviction-policy"
export { LfuEvictionPolicy } from "./core/eviction/lfu-eviction-policy"
export { LruEvictionPolicy } from "./core/eviction/lru-eviction-policy"
export {
  SimpleCacheManager,
  type SimpleCacheManagerDeps,
  type SimpleCacheManagerOptions,
} from "./core/manager/simple-cache-manager"
export { SimpleCacheMetrics } from "./core/metrics/simple-cache-metrics"
export { acceptsSchema } from "./core/pipeline/accepts-schema"
export { CacheOperationContext } from "./core/pipeline/cache-operation-context"
export { CachePipeline, type CachePipelineDeps } from "./core/pipeline/cache-pipeline"
export {
  type ResolveOperationCachesDeps,
  resolveOperationCaches,
} from "./core/resolver/resolve-operation-caches"
export {
  SimpleCacheResolver,
  type SimpleCacheResolverDeps,
} from "./core/resolver/simple-cache-resolver"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheErrorHandler } from "./ports/cache-error-handler"
export type {
  CacheClearEvent,
  CacheEvent,
  CacheEvictEvent,
  CacheEvictionReason,
  CacheExpireEvent,
  CacheHitEvent,
  CacheMissEvent,
  CachePutEvent,
} from "./ports/cache-event"
export type {
  CacheEvictionPolicy,
  EvictionCandidate,
  EvictionPolicyName,
  FifoEvictionPolicyName,
  LfuEvictionPolicyName,
  LruEvictionPolicyName,
} from "./ports/cache-eviction-policy"
export type { CacheManager } from "./ports/cache-manager"
export type {
  CacheCounter,
  CacheMetrics,
  CacheMetricsGraph,
  CacheMetricTotals,
} from "./ports/cache-metrics"
export type {
  CacheOperationSpec,
  CachePolicy,
  InvalidateOperation,
  ReadThroughOperation,
  WriteThroughOperation,
} from "./ports/cache-operation"
export type { CacheResolver } from "./ports/cache-resolver"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { CacheStorage } from "./ports/cache-storage"
