import type { Environment } from "@palisade/config"
import {
  BackendOperationError,
  describeKey,
  type Invocation,
  type KeyGenerator,
  type Registry,
  type ResourceKey,
  shouldSkip,
} from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { RateLimitManager } from "../../ports/rate-limit-manager"
import type { RateLimitOperation } from "../../ports/rate-limit-operation"
import type { RateLimitOutcome } from "../../ports/rate-limit-outcome"
import type { RateLimitResolver } from "../../ports/rate-limit-resolver"
import type { RateLimitResult } from "../../ports/rate-limit-result"
import type { RateLimitStorage } from "../../ports/rate-limit-storage"
import { RateLimitExceededError } from "../errors/rate-limit-exceeded-error"
import { resolveOperationStorages } from "../resolver/resolve-operation-storages"
import { RateLimitOperationContext } from "./rate-limit-operation-context"

export type RateLimitPipelineDeps = {
  environment: Environment
  logger: Logger

  defaultResolver: RateLimitResolver
  resolvers: Registry<RateLimitResolver>
  managers: Registry<RateLimitManager>

  defaultKeyGenerator: KeyGenerator
  keyGenerators: Registry<KeyGenerator>
}

/**
 * Consumes quota from every resolved store before letting a call through.
 *
 * @remarks
 * Stores are tried in resolution order. A denial rolls back the stores
 * that already accepted, newest first, and either throws
 * {@link RateLimitExceededError} or returns a `denied` outcome. When the
 * call itself throws, every accepted consumption is rolled back the same
 * way before the error is rethrown. Rollback is best-effort: a failing
 * rollback is logged and never replaces the error that triggered it.
 *
 * Cancelling the surrounding work does not roll anything back.
 */
export class RateLimitPipeline {
  private readonly logger: Logger

  constructor(private readonly deps: RateLimitPipelineDeps) {
    this.logger = deps.logger.child({ component: "rate-limit-pipeline" })
  }

  async execute<R>(operation: RateLimitOperation, invocation: Invocation<R>): Promise<RateLimitOutcome<R>> {
    const context = new RateLimitOperationContext({
      invocation,
      environment: this.deps.environment,
      keyGenerators: this.deps.keyGenerators,
      defaultKeyGenerator: this.deps.defaultKeyGenerator,
    })
    const storages = await resolveOperationStorages(this.deps, operation, invocation)

    context.addResources(storages.map((storage) => storage.getResource()))

    if (await shouldSkip(operation, context)) {
      context.markSkipped()
      return { kind: "unmetered", value: await invocation.proceed() }
    }

    const identifier = context.generateKey(operation.keyGenerator)
    const denial = await this.consume(storages, identifier, operation, context)

    if (denial) {
      if (operation.throwOnExceeded ?? true) throw new RateLimitExceededError(denial)

      return { kind: "denied", result: denial }
    }

    let value: R

    try {
      value = await invocation.proceed()
    } catch (err) {
      await this.compensate(context, identifier)
      throw err
    }

    return { kind: "allowed", value, results: context.getConsumptions().map((c) => c.result) }
  }

  /** @returns the denying result, or `undefined` when every store accepted. */
  private async consume(
    storages: readonly RateLimitStorage[],
    identifier: ResourceKey,
    operation: RateLimitOperation,
    context: RateLimitOperationContext,
  ): Promise<RateLimitResult | undefined> {
    for (const storage of storages) {
      let result: RateLimitResult

      try {
        result = await storage.tryConsume(identifier, operation.limit, operation.windowMs)
      } catch (err) {
        await this.compensate(context, identifier)
        throw new BackendOperationError({
          backend: storage.name,
          operation: "tryConsume",
          key: describeKey(identifier),
          cause: err,
        })
      }

      if (!result.allowed) {
        await this.compensate(context, identifier)
        this.logger.debug("Rate limit denied", { limitName: storage.name, identifier: describeKey(identifier) })

        return result
      }

      context.recordConsumption(storage, result)
    }

    return undefined
  }

  private async compensate(context: RateLimitOperationContext, identifier: ResourceKey): Promise<void> {
    for (const { storage, result } of [...context.getConsumptions()].reverse()) {
      try {
        await storage.rollbackConsume(identifier, result.windowMs, result.resetTime.getTime())
      } catch (err) {
        this.logger.warn("Rate limit rollback failed", {
          err,
          limitName: storage.name,
          identifier: describeKey(identifier),
        })
      }
    }
  }
}
