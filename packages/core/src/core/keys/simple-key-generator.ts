import type { InvocationArguments, MethodIdentity } from "../../ports/invocation"
import type { KeyGenerator, ResourceKey } from "../../ports/key-generator"
import { SimpleKey } from "./simple-key"

/**
 * Default key policy.
 *
 * - no arguments: {@link SimpleKey.EMPTY}
 * - exactly one argument, positional or named: the argument itself
 *   (`null`/`undefined` map to `SimpleKey.EMPTY`)
 * - more: a {@link SimpleKey} over every argument
 *
 * Target and method do not take part; distinct methods sharing a backend
 * need their own key generator or distinct backend names.
 */
export class SimpleKeyGenerator implements KeyGenerator {
  generate(_target: object, _method: MethodIdentity, args: InvocationArguments): ResourceKey {
    const namedValues = Object.values(args.named)
    const total = args.positional.length + namedValues.length

    if (total === 0) return SimpleKey.EMPTY

    if (total === 1) {
      const only = args.positional.length === 1 ? args.positional[0] : namedValues[0]

      return only ?? SimpleKey.EMPTY
    }

    return new SimpleKey(args.positional, args.named)
  }
}
