export {
  MemoryRateLimitStorage,
  type MemoryRateLimitStorageDeps,
  type MemoryRateLimitStorageOptions,
} from "./adapters/memory/memory-rate-limit-storage"
export { type RateLimitHeaders, RateLimitExceededError } from "./core/errors/rate-limit-exceeded-error"
export {
  SimpleRateLimitManager,
  type SimpleRateLimitManagerDeps,
  type SimpleRateLimitManagerOptions,
} from "./core/manager/simple-rate-limit-manager"
export { SimpleRateLimitMetrics } from "./core/metrics/simple-rate-limit-metrics"
export { type Consumption, RateLimitOperationContext } from "./core/pipeline/rate-limit-operation-context"
export { RateLimitPipeline, type RateLimitPipelineDeps } from "./core/pipeline/rate-limit-pipeline"
export {
  resolveOperationStorages,
  type ResolveOperationStoragesDeps,
} from "./core/resolver/resolve-operation-storages"
export {
  SimpleRateLimitResolver,
  type SimpleRateLimitResolverDeps,
} from "./core/resolver/simple-rate-limit-resolver"
export { type RateLimitResultInit, SimpleRateLimitResult } from "./core/result/simple-rate-limit-result"
export { RateLimitWindow } from "./core/window/rate-limit-window"
export type {
  RateLimitAllowedEvent,
  RateLimitClearEvent,
  RateLimitDeniedEvent,
  RateLimitEvent,
  RateLimitResetEvent,
} from "./ports/rate-limit-event"
export type { RateLimitManager } from "./ports/rate-limit-manager"
export type {
  RateLimitCounter,
  RateLimitMetrics,
  RateLimitMetricsGraph,
  RateLimitMetricTotals,
} from "./ports/rate-limit-metrics"
export type { RateLimitOperation } from "./ports/rate-limit-operation"
export type {
  RateLimitAllowed,
  RateLimitDenied,
  RateLimitOutcome,
  RateLimitUnmetered,
} from "./ports/rate-limit-outcome"
export type { RateLimitResolver } from "./ports/rate-limit-resolver"
export type { RateLimitResult, RateLimitResultJson } from "./ports/rate-limit-result"
export type { RateLimitStorage } from "./ports/rate-limit-storage"
