/**
 * Validated, typed configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional() }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "PALISADE_" })],
 * })
 *
 * config.value.CACHE_MAX_ENTRIES   // 500
 * config.explain("CACHE_MAX_ENTRIES") // "env"
 * ```
 */
export interface ConfigView<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value for `key`,
   * or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that contributed at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys present in sources but not declared by the schema. */
  unknownKeys(): string[]
}
