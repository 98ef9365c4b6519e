import type { ConditionGate, ResourceCondition } from "../../ports/condition"
import type { OperationContext } from "../../ports/operation-context"

const ALWAYS: ResourceCondition = { shouldApply: () => true }
const NEVER: ResourceCondition = { shouldApply: () => false }

export function always(): ResourceCondition {
  return ALWAYS
}

export function never(): ResourceCondition {
  return NEVER
}

/** True when both are true. `right` is not evaluated when `left` is false. */
export function and(left: ResourceCondition, right: ResourceCondition): ResourceCondition {
  return {
    async shouldApply(context) {
      if (!(await left.shouldApply(context))) return false

      return right.shouldApply(context)
    },
  }
}

/** True when either is true. `right` is not evaluated when `left` is true. */
export function or(left: ResourceCondition, right: ResourceCondition): ResourceCondition {
  return {
    async shouldApply(context) {
      if (await left.shouldApply(context)) return true

      return right.shouldApply(context)
    },
  }
}

export function not(condition: ResourceCondition): ResourceCondition {
  return {
    async shouldApply(context) {
      return !(await condition.shouldApply(context))
    },
  }
}

/** True when neither is true. Both sides are evaluated, `left` first. */
export function nor(left: ResourceCondition, right: ResourceCondition): ResourceCondition {
  return {
    async shouldApply(context) {
      const a = await left.shouldApply(context)
      const b = await right.shouldApply(context)

      return !a && !b
    },
  }
}

/**
 * Custom gate, e.g. on the invocation's arguments.
 *
 * @example
 * ```ts
 * when(({ invocation }) => invocation.args.positional[0] !== "admin")
 * ```
 */
export function when(
  predicate: (context: OperationContext) => boolean | Promise<boolean>,
): ResourceCondition {
  return { shouldApply: predicate }
}

/**
 * Applies `unless` first (skip when true), then `condition` (skip when false).
 */
export async function shouldSkip(gate: ConditionGate, context: OperationContext): Promise<boolean> {
  if (gate.unless && (await gate.unless.shouldApply(context))) return true
  if (gate.condition && !(await gate.condition.shouldApply(context))) return true

  return false
}
