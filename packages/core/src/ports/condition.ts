import type { OperationContext } from "./operation-context"

/**
 * Decides whether a policy applies to one invocation.
 *
 * @remarks
 * Used twice per pipeline: `unless` is evaluated first and skips the
 * policy when true; `condition` is evaluated second and skips it when
 * false. Implementations must not have side effects.
 */
export interface ResourceCondition {
  shouldApply(context: OperationContext): boolean | Promise<boolean>
}

export type ConditionGate = Readonly<{
  condition?: ResourceCondition
  unless?: ResourceCondition
}>
