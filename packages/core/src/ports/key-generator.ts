import type { InvocationArguments, MethodIdentity } from "./invocation"

/**
 * Any non-nullish value. Keys are compared by value; see `keyFingerprint`.
 */
export type ResourceKey = NonNullable<unknown>

/**
 * Derives the cache key / rate-limit identifier for an invocation.
 *
 * @remarks
 * Must be deterministic: the same target, method and arguments always
 * produce value-equal keys.
 */
export interface KeyGenerator {
  generate(target: object, method: MethodIdentity, args: InvocationArguments): ResourceKey
}

export interface ConditionalKeyGenerator extends KeyGenerator {
  canGenerate(method: MethodIdentity, target: object): boolean
}

export function isConditionalKeyGenerator(
  generator: KeyGenerator,
): generator is ConditionalKeyGenerator {
  return "canGenerate" in generator && typeof generator.canGenerate === "function"
}
