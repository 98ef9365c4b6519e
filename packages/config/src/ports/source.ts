/**
 * A source of raw configuration values.
 *
 * A ConfigSource only loads. Validation, coercion and merging happen in
 * {@link loadConfig} / {@link loadEnvironment}; later sources override
 * earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used for provenance, e.g. "env", "dotenv:.env.local", "object:overrides".
   */
  readonly name: string

  /**
   * Load configuration values. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
