import type { ResourceKey } from "@palisade/core"
import type { CacheStorage } from "./cache-storage"

/**
 * Decides what a failing backend call means for the pipeline.
 *
 * @remarks
 * Called once per failing cache. Returning lets the step continue with
 * the remaining caches; throwing fails the pipeline once the step has
 * tried every cache.
 */
export interface CacheErrorHandler {
  onGet(error: unknown, cache: CacheStorage, key: ResourceKey): void | Promise<void>
  onPut(error: unknown, cache: CacheStorage, key: ResourceKey, value: unknown): void | Promise<void>
  onEvict(error: unknown, cache: CacheStorage, key: ResourceKey): void | Promise<void>
  onClear(error: unknown, cache: CacheStorage): void | Promise<void>
}
