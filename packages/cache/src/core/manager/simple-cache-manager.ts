import { NotFoundError } from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { CacheManager } from "../../ports/cache-manager"
import type { CacheStorage } from "../../ports/cache-storage"

export type SimpleCacheManagerDeps = {
  logger: Logger

  /** Caches known up front. */
  caches?: readonly CacheStorage[]

  /** Consulted in order before this manager's own caches. */
  delegates?: readonly CacheManager[]

  /** Builds a cache for an unknown name when auto-creation is on. */
  createCache?: (name: string) => CacheStorage
}

export type SimpleCacheManagerOptions = {
  /** @default true */
  autoCreate?: boolean

  /** Throw `NotFoundError` instead of returning `undefined`. @default false */
  failIfNotFound?: boolean
}

export class SimpleCacheManager implements CacheManager {
  private readonly caches = new Map<string, CacheStorage>()
  private readonly logger: Logger

  constructor(
    private readonly deps: SimpleCacheManagerDeps,
    private readonly opts: SimpleCacheManagerOptions = {},
  ) {
    for (const cache of deps.caches ?? []) this.caches.set(cache.name, cache)

    this.logger = deps.logger.child({ component: "cache-manager" })
  }

  addCache(cache: CacheStorage): void {
    this.caches.set(cache.name, cache)
  }

  async getCache(name: string): Promise<CacheStorage | undefined> {
    for (const delegate of this.deps.delegates ?? []) {
      const found = await delegate.getCache(name)

      if (found) return found
    }

    const own = this.caches.get(name)
    if (own) return own

    const { createCache } = this.deps

    if ((this.opts.autoCreate ?? true) && createCache) {
      const created = createCache(name)

      this.caches.set(name, created)
      this.logger.info("Created cache on first use", { cache: name })

      return created
    }

    if (this.opts.failIfNotFound ?? false) throw new NotFoundError("cache", name)

    return undefined
  }

  async getCacheNames(): Promise<string[]> {
    const names = new Set<string>()

    for (const delegate of this.deps.delegates ?? []) {
      for (const name of await delegate.getCacheNames()) names.add(name)
    }
    for (const name of this.caches.keys()) names.add(name)

    return [...names]
  }

  async clearAll(): Promise<void> {
    for (const delegate of this.deps.delegates ?? []) await delegate.clearAll()
    for (const cache of this.caches.values()) await cache.clear()
  }

  async destroy(): Promise<void> {
    for (const delegate of this.deps.delegates ?? []) await delegate.destroy()

    for (const cache of this.caches.values()) {
      await cache.invalidate()
      await cache.clear()
    }

    this.caches.clear()
  }
}
