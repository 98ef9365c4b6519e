import { NotFoundError } from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { RateLimitManager } from "../../ports/rate-limit-manager"
import type { RateLimitStorage } from "../../ports/rate-limit-storage"

export type SimpleRateLimitManagerDeps = {
  logger: Logger
  storages?: readonly RateLimitStorage[]
  delegates?: readonly RateLimitManager[]
  createStorage?: (name: string) => RateLimitStorage
}

export type SimpleRateLimitManagerOptions = {
  /** @default true */
  autoCreate?: boolean

  /** @default false */
  failIfNotFound?: boolean
}

/**
 * Same lookup order as the cache manager: delegates, own stores,
 * auto-creation, then `undefined` or `NotFoundError`.
 */
export class SimpleRateLimitManager implements RateLimitManager {
  private readonly storages = new Map<string, RateLimitStorage>()
  private readonly logger: Logger

  constructor(
    private readonly deps: SimpleRateLimitManagerDeps,
    private readonly opts: SimpleRateLimitManagerOptions = {},
  ) {
    for (const storage of deps.storages ?? []) this.storages.set(storage.name, storage)

    this.logger = deps.logger.child({ component: "rate-limit-manager" })
  }

  addStorage(storage: RateLimitStorage): void {
    this.storages.set(storage.name, storage)
  }

  async getStorage(name: string): Promise<RateLimitStorage | undefined> {
    for (const delegate of this.deps.delegates ?? []) {
      const found = await delegate.getStorage(name)

      if (found) return found
    }

    const own = this.storages.get(name)
    if (own) return own

    const { createStorage } = this.deps

    if ((this.opts.autoCreate ?? true) && createStorage) {
      const created = createStorage(name)

      this.storages.set(name, created)
      this.logger.info("Created rate limit storage on first use", { limitName: name })

      return created
    }

    if (this.opts.failIfNotFound ?? false) throw new NotFoundError("rate limit storage", name)

    return undefined
  }

  async getStorageNames(): Promise<string[]> {
    const names = new Set<string>()

    for (const delegate of this.deps.delegates ?? []) {
      for (const name of await delegate.getStorageNames()) names.add(name)
    }
    for (const name of this.storages.keys()) names.add(name)

    return [...names]
  }

  async clearAll(): Promise<void> {
    for (const delegate of this.deps.delegates ?? []) await delegate.clearAll()
    for (const storage of this.storages.values()) await storage.clear()
  }

  async destroy(): Promise<void> {
    for (const delegate of this.deps.delegates ?? []) await delegate.destroy()

    for (const storage of this.storages.values()) {
      await storage.invalidate()
      await storage.clear()
    }

    this.storages.clear()
  }
}
