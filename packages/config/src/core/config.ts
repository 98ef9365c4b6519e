import type { ConfigView } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements ConfigView<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())].filter((name) => name !== "default")
  }

  unknownKeys(): string[] {
    const declared = new Set(Object.keys(this.data))

    return [...this.mergedKeys].filter((k) => !declared.has(k))
  }
}
