import type { ConfigSource } from "../ports/source"

export type MergedSources = {
  values: Record<string, unknown>
  provenance: Map<string, string>
}

export async function mergeSources(sources: readonly ConfigSource[]): Promise<MergedSources> {
  const values: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const loaded = await source.load()

    for (const [key, value] of Object.entries(loaded)) {
      if (value === undefined) continue

      values[key] = value
      provenance.set(key, source.name)
    }
  }

  return { values, provenance }
}
