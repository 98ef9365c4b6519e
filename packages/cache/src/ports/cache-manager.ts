import type { CacheStorage } from "./cache-storage"

/**
 * Looks up caches by name.
 *
 * @remarks
 * `getCache` may create a cache on demand or throw `NotFoundError`,
 * depending on the manager's configuration.
 */
export interface CacheManager {
  getCache(name: string): Promise<CacheStorage | undefined>
  getCacheNames(): Promise<string[]>
  clearAll(): Promise<void>

  /** Invalidates, clears and forgets every cache the manager holds. */
  destroy(): Promise<void>
}
