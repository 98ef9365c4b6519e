import type { Environment } from "@palisade/config"
import type { Invocation } from "../../ports/invocation"
import type { KeyGenerator, ResourceKey } from "../../ports/key-generator"
import type { OperationContext } from "../../ports/operation-context"
import type { Registry } from "../../ports/registry"
import type { Resource } from "../../ports/resource"

export type InvocationContextDeps = {
  invocation: Invocation<unknown>
  environment: Environment
  keyGenerators: Registry<KeyGenerator>
  defaultKeyGenerator: KeyGenerator
}

const DEFAULT_GENERATOR = ""

/**
 * Per-invocation state shared by the cache and rate-limit pipelines.
 *
 * @remarks
 * Short-lived: created for one guarded call and discarded afterwards.
 * Keys are generated lazily and memoized per key generator name.
 */
export class InvocationContext implements OperationContext {
  readonly invocation: Invocation<unknown>
  readonly environment: Environment

  private readonly keys = new Map<string, ResourceKey>()
  private readonly resources: Resource[] = []

  constructor(private readonly deps: InvocationContextDeps) {
    this.invocation = deps.invocation
    this.environment = deps.environment
  }

  /**
   * @param generatorName - Registered key generator; the default one when omitted.
   * @throws NotFoundError for an unknown generator name.
   */
  generateKey(generatorName?: string): ResourceKey {
    const slot = generatorName ?? DEFAULT_GENERATOR
    const cached = this.keys.get(slot)

    if (cached !== undefined) return cached

    const generator = generatorName
      ? this.deps.keyGenerators.require(generatorName)
      : this.deps.defaultKeyGenerator
    const { target, method, args } = this.invocation
    const key = generator.generate(target, method, args)

    this.keys.set(slot, key)

    return key
  }

  /** Records backends in play; a backend already recorded is not added twice. */
  addResources(resources: readonly Resource[]): void {
    for (const resource of resources) {
      const known = this.resources.some((r) => r.kind === resource.kind && r.name === resource.name)

      if (!known) this.resources.push(resource)
    }
  }

  getResources(): readonly Resource[] {
    return this.resources
  }
}
