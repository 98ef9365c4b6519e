import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigView } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./config-validation-error"
import { mergeSources } from "./merge-sources"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<ConfigView<T>> {
  const { values, provenance } = await mergeSources(sources ?? [new EnvSource()])

  const result = schema.safeParse(values)

  if (!result.success) {
    throw new ConfigValidationError(
      "Configuration validation failed:",
      z.prettifyError(result.error),
    )
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(values)))
}
