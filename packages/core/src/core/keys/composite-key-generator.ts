import type { InvocationArguments, MethodIdentity } from "../../ports/invocation"
import {
  type ConditionalKeyGenerator,
  type KeyGenerator,
  type ResourceKey,
  isConditionalKeyGenerator,
} from "../../ports/key-generator"
import { type Prioritized, sortByPriority } from "../ordering/sort-by-priority"
import { SimpleKeyGenerator } from "./simple-key-generator"

/**
 * Chains key generators by priority.
 *
 * @remarks
 * The first conditional generator whose `canGenerate` accepts the method
 * wins. When none accepts, the first unconditional generator is used, and
 * when there is none of those either, `fallback` (a
 * {@link SimpleKeyGenerator} unless given).
 */
export class CompositeKeyGenerator implements KeyGenerator {
  private readonly conditional: ConditionalKeyGenerator[]
  private readonly unconditional: KeyGenerator[]

  constructor(
    generators: readonly Prioritized<KeyGenerator>[],
    private readonly fallback: KeyGenerator = new SimpleKeyGenerator(),
  ) {
    const ordered = sortByPriority(generators)

    this.conditional = ordered.filter(isConditionalKeyGenerator)
    this.unconditional = ordered.filter((g) => !isConditionalKeyGenerator(g))
  }

  generate(target: object, method: MethodIdentity, args: InvocationArguments): ResourceKey {
    return this.select(method, target).generate(target, method, args)
  }

  private select(method: MethodIdentity, target: object): KeyGenerator {
    const accepting = this.conditional.find((g) => g.canGenerate(method, target))

    return accepting ?? this.unconditional[0] ?? this.fallback
  }
}
