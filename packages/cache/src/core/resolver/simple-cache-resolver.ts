import type { Invocation } from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { CacheManager } from "../../ports/cache-manager"
import type { CacheOperationSpec } from "../../ports/cache-operation"
import type { CacheResolver } from "../../ports/cache-resolver"
import type { CacheStorage } from "../../ports/cache-storage"

export type SimpleCacheResolverDeps = {
  manager: CacheManager
  logger: Logger

  /** Asked first; a failing delegate is logged and skipped. */
  delegates?: readonly CacheResolver[]
}

/**
 * Resolves the operation's `cacheNames` through a manager, after any
 * delegate resolvers. Each cache appears once, first position wins.
 */
export class SimpleCacheResolver implements CacheResolver {
  private readonly logger: Logger

  constructor(private readonly deps: SimpleCacheResolverDeps) {
    this.logger = deps.logger.child({ component: "cache-resolver" })
  }

  async resolveCaches(operation: CacheOperationSpec, invocation: Invocation<unknown>): Promise<CacheStorage[]> {
    const resolved = new Map<string, CacheStorage>()
    const add = (cache: CacheStorage) => {
      if (!resolved.has(cache.name)) resolved.set(cache.name, cache)
    }

    for (const delegate of this.deps.delegates ?? []) {
      try {
        for (const cache of await delegate.resolveCaches(operation, invocation)) add(cache)
      } catch (err) {
        this.logger.warn("Delegate cache resolver failed", { err, operation: operation.kind })
      }
    }

    for (const name of operation.cacheNames) {
      const cache = await this.deps.manager.getCache(name)

      if (cache) add(cache)
    }

    return [...resolved.values()]
  }
}
