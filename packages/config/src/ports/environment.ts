import type { ZodType } from "zod"

/**
 * Read-only, string-valued property lookup.
 *
 * @remarks
 * This is what conditions and managers consult at run time (e.g. an
 * environment predicate gating a cache operation). It is deliberately
 * narrower than {@link ConfigView}: no schema is required up front,
 * typed reads validate one property at a time.
 */
export interface Environment {
  getProperty(name: string): string | undefined

  containsProperty(name: string): boolean

  /**
   * Reads `name` and parses it with `schema`.
   *
   * @returns `undefined` when the property is absent.
   * @throws ConfigValidationError when the value does not satisfy `schema`.
   */
  getPropertyAs<T>(name: string, schema: ZodType<T>): T | undefined
}
