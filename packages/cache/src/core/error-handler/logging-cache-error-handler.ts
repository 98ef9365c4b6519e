import { describeKey, type ResourceKey } from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { CacheErrorHandler } from "../../ports/cache-error-handler"
import type { CacheStorage } from "../../ports/cache-storage"

/**
 * Logs backend failures at error level and lets the pipeline carry on,
 * so a broken cache degrades to calling through.
 */
export class LoggingCacheErrorHandler implements CacheErrorHandler {
  private readonly logger: Logger

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.child({ component: "cache-error-handler" })
  }

  onGet(error: unknown, cache: CacheStorage, key: ResourceKey): void {
    const described = describeKey(key)

    this.logger.error(`Failed to get from cache "${cache.name}" for key ${described}`, {
      err: error,
      cache: cache.name,
      operation: "get",
      key: described,
    })
  }

  onPut(error: unknown, cache: CacheStorage, key: ResourceKey): void {
    const described = describeKey(key)

    this.logger.error(`Failed to put into cache "${cache.name}" for key ${described}`, {
      err: error,
      cache: cache.name,
      operation: "put",
      key: described,
    })
  }

  onEvict(error: unknown, cache: CacheStorage, key: ResourceKey): void {
    const described = describeKey(key)

    this.logger.error(`Failed to evict from cache "${cache.name}" for key ${described}`, {
      err: error,
      cache: cache.name,
      operation: "evict",
      key: described,
    })
  }

  onClear(error: unknown, cache: CacheStorage): void {
    this.logger.error(`Failed to clear cache "${cache.name}"`, {
      err: error,
      cache: cache.name,
      operation: "clear",
    })
  }
}
