export type ResourceKind = "cache" | "rate-limit"

/**
 * Diagnostic handle on a backend taking part in an operation.
 */
export interface Resource {
  readonly kind: ResourceKind
  readonly name: string
  size(): number
}
