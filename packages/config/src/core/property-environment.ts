import { type ZodType, z } from "zod"
import type { Environment } from "../ports/environment"
import type { ConfigSource } from "../ports/source"
import { ConfigValidationError } from "./config-validation-error"
import { mergeSources } from "./merge-sources"

type Property = {
  value: string
  source: string
}

export class PropertyEnvironment implements Environment {
  private readonly properties: ReadonlyMap<string, Property>

  constructor(properties: Iterable<readonly [string, Property]> = []) {
    this.properties = new Map(properties)
  }

  static fromRecord(record: Record<string, string | undefined>, source = "object"): PropertyEnvironment {
    const entries: [string, Property][] = []

    for (const [name, value] of Object.entries(record)) {
      if (value !== undefined) entries.push([name, { value, source }])
    }

    return new PropertyEnvironment(entries)
  }

  getProperty(name: string): string | undefined {
    return this.properties.get(name)?.value
  }

  containsProperty(name: string): boolean {
    return this.properties.has(name)
  }

  getPropertyAs<T>(name: string, schema: ZodType<T>): T | undefined {
    const raw = this.getProperty(name)

    if (raw === undefined) return undefined

    const result = schema.safeParse(raw)

    if (!result.success) {
      throw new ConfigValidationError(
        `Property "${name}" is invalid:`,
        z.prettifyError(result.error),
      )
    }

    return result.data
  }

  /** Source that supplied `name`, or `undefined` when it is absent. */
  explain(name: string): string | undefined {
    return this.properties.get(name)?.source
  }

  names(): string[] {
    return [...this.properties.keys()]
  }
}

function toPropertyValue(value: unknown): string | undefined {
  if (typeof value === "string") return value
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value)
  }

  return undefined
}

/**
 * Merges `sources` into a {@link PropertyEnvironment}.
 *
 * Only scalar values are kept; nested objects from structured sources
 * are not properties and are skipped.
 */
export async function loadEnvironment(sources: readonly ConfigSource[]): Promise<PropertyEnvironment> {
  const { values, provenance } = await mergeSources(sources)
  const entries: [string, Property][] = []

  for (const [name, raw] of Object.entries(values)) {
    const value = toPropertyValue(raw)

    if (value !== undefined) {
      entries.push([name, { value, source: provenance.get(name) ?? "unknown" }])
    }
  }

  return new PropertyEnvironment(entries)
}
