import type { Invocation } from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { RateLimitManager } from "../../ports/rate-limit-manager"
import type { RateLimitOperation } from "../../ports/rate-limit-operation"
import type { RateLimitResolver } from "../../ports/rate-limit-resolver"
import type { RateLimitStorage } from "../../ports/rate-limit-storage"

export type SimpleRateLimitResolverDeps = {
  manager: RateLimitManager
  logger: Logger
  delegates?: readonly RateLimitResolver[]
}

export class SimpleRateLimitResolver implements RateLimitResolver {
  private readonly logger: Logger

  constructor(private readonly deps: SimpleRateLimitResolverDeps) {
    this.logger = deps.logger.child({ component: "rate-limit-resolver" })
  }

  async resolveStorages(operation: RateLimitOperation, invocation: Invocation<unknown>): Promise<RateLimitStorage[]> {
    const resolved = new Map<string, RateLimitStorage>()
    const add = (storage: RateLimitStorage) => {
      if (!resolved.has(storage.name)) resolved.set(storage.name, storage)
    }

    for (const delegate of this.deps.delegates ?? []) {
      try {
        for (const storage of await delegate.resolveStorages(operation, invocation)) add(storage)
      } catch (err) {
        this.logger.warn("Delegate rate limit resolver failed", { err })
      }
    }

    for (const name of operation.storageNames) {
      const storage = await this.deps.manager.getStorage(name)

      if (storage) add(storage)
    }

    return [...resolved.values()]
  }
}
