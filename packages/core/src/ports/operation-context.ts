import type { Environment } from "@palisade/config"
import type { Invocation } from "./invocation"
import type { Resource } from "./resource"

/**
 * What conditions can see about the operation being gated.
 */
export interface OperationContext {
  readonly invocation: Invocation<unknown>
  readonly environment: Environment
  getResources(): readonly Resource[]
}
