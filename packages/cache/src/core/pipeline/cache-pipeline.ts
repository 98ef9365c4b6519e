import type { Environment } from "@palisade/config"
import {
  describeKey,
  FirstFailure,
  type Invocation,
  type KeyGenerator,
  type Milliseconds,
  type Registry,
  type ResourceKey,
  shouldSkip,
} from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { CacheErrorHandler } from "../../ports/cache-error-handler"
import type { CacheManager } from "../../ports/cache-manager"
import type {
  CacheOperationSpec,
  CachePolicy,
  InvalidateOperation,
  ReadThroughOperation,
  WriteThroughOperation,
} from "../../ports/cache-operation"
import type { CacheResolver } from "../../ports/cache-resolver"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStorage } from "../../ports/cache-storage"
import { resolveOperationCaches } from "../resolver/resolve-operation-caches"
import { CacheOperationContext } from "./cache-operation-context"

export type CachePipelineDeps = {
  environment: Environment
  logger: Logger
  errorHandler: CacheErrorHandler

  defaultResolver: CacheResolver
  resolvers: Registry<CacheResolver>
  managers: Registry<CacheManager>

  defaultKeyGenerator: KeyGenerator
  keyGenerators: Registry<KeyGenerator>
}

type ActiveStep = {
  caches: CacheStorage[]
  key: ResourceKey
}

/**
 * Runs a guarded call through its cache policy.
 *
 * @remarks
 * Order for one call:
 * 1. invalidation marked `beforeInvocation`
 * 2. read-through probe; a hit skips 3 to 5
 * 3. the call itself
 * 4. write-through
 * 5. read-through store, only after a miss
 * 6. invalidation after a normal return
 *
 * Each step resolves its caches, then skips itself when its gate says so.
 * Backend failures go to the error handler one cache at a time; when the
 * handler throws, the step still visits the remaining caches and the
 * first error surfaces at the end of the step.
 */
export class CachePipeline {
  private readonly logger: Logger

  constructor(private readonly deps: CachePipelineDeps) {
    this.logger = deps.logger.child({ component: "cache-pipeline" })
  }

  async execute<R>(policy: CachePolicy<R>, invocation: Invocation<R>): Promise<R> {
    const context = new CacheOperationContext({
      invocation,
      environment: this.deps.environment,
      keyGenerators: this.deps.keyGenerators,
      defaultKeyGenerator: this.deps.defaultKeyGenerator,
    })
    const { readThrough, writeThrough, invalidate } = policy

    if (invalidate?.beforeInvocation) await this.invalidate(invalidate, context)

    const cached = readThrough ? await this.probe(readThrough, context) : undefined

    if (cached?.kind === "hit") {
      if (invalidate && !invalidate.beforeInvocation) await this.invalidate(invalidate, context)

      return cached.value
    }

    const result = await invocation.proceed()
    context.setResult(result)

    if (writeThrough) await this.store(writeThrough, context, result)
    if (readThrough && context.isCacheMiss()) await this.store(readThrough, context, result)
    if (invalidate && !invalidate.beforeInvocation) await this.invalidate(invalidate, context)

    return result
  }

  private async probe<R>(
    operation: ReadThroughOperation<R>,
    context: CacheOperationContext,
  ): Promise<CacheResult<R>> {
    const step = await this.begin(operation, context)

    if (!step) return { kind: "miss" }

    const failure = new FirstFailure()

    for (const cache of step.caches) {
      let entry: Awaited<ReturnType<CacheStorage["get"]>>

      try {
        entry = await cache.get(step.key)
      } catch (err) {
        await failure.capture(() => this.deps.errorHandler.onGet(err, cache, step.key))
        continue
      }

      if (entry === undefined) continue

      const { value } = entry

      if (!operation.accepts(value)) {
        this.logger.warn("Ignoring cached value of an unexpected shape", {
          cache: cache.name,
          key: describeKey(step.key),
        })
        continue
      }

      failure.throwIfFailed()
      context.setCachedResult(value)

      return { kind: "hit", value }
    }

    failure.throwIfFailed()
    context.markCacheMiss()

    return { kind: "miss" }
  }

  private async store(
    operation: ReadThroughOperation<unknown> | WriteThroughOperation,
    context: CacheOperationContext,
    value: unknown,
  ): Promise<void> {
    const step = await this.begin(operation, context)

    if (!step) return

    await this.forEachCache(step.caches, (cache) => this.put(cache, step.key, value, operation.ttlMs))
  }

  private async put(
    cache: CacheStorage,
    key: ResourceKey,
    value: unknown,
    ttlMs: Milliseconds | undefined,
  ): Promise<void> {
    try {
      await cache.put(key, value, ttlMs)
    } catch (err) {
      await this.deps.errorHandler.onPut(err, cache, key, value)
    }
  }

  private async invalidate(operation: InvalidateOperation, context: CacheOperationContext): Promise<void> {
    const step = await this.begin(operation, context)

    if (!step) return

    await this.forEachCache(step.caches, async (cache) => {
      if (operation.allEntries) {
        try {
          await cache.clear()
        } catch (err) {
          await this.deps.errorHandler.onClear(err, cache)
        }
        return
      }

      try {
        await cache.evictIfPresent(step.key)
      } catch (err) {
        await this.deps.errorHandler.onEvict(err, cache, step.key)
      }
    })
  }

  /**
   * Resolves caches, records them on the context, applies the gate and
   * generates the key.
   *
   * @returns `undefined` when the step is skipped.
   */
  private async begin(
    operation: CacheOperationSpec,
    context: CacheOperationContext,
  ): Promise<ActiveStep | undefined> {
    const caches = await resolveOperationCaches(this.deps, operation, context.invocation)

    context.addResources(caches.map((cache) => cache.getResource()))

    if (await shouldSkip(operation, context)) {
      this.logger.debug("Skipping cache operation", { operation: operation.kind })
      return undefined
    }

    if (caches.length === 0) return undefined

    return { caches, key: context.generateKey(operation.keyGenerator) }
  }

  private async forEachCache(
    caches: readonly CacheStorage[],
    fn: (cache: CacheStorage) => Promise<void>,
  ): Promise<void> {
    const failure = new FirstFailure()

    for (const cache of caches) await failure.capture(() => fn(cache))

    failure.throwIfFailed()
  }
}
