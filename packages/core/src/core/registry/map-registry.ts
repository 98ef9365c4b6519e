import type { Registry } from "../../ports/registry"
import { NotFoundError } from "../errors/errors"

export class MapRegistry<T> implements Registry<T> {
  private readonly entries: Map<string, T>

  /**
   * @param kind - Used in {@link NotFoundError} messages, e.g. "cache resolver".
   */
  constructor(
    private readonly kind: string,
    entries: Iterable<readonly [string, T]> = [],
  ) {
    this.entries = new Map(entries)
  }

  register(name: string, value: T): void {
    this.entries.set(name, value)
  }

  get(name: string): T | undefined {
    return this.entries.get(name)
  }

  require(name: string): T {
    const value = this.entries.get(name)

    if (value === undefined) throw new NotFoundError(this.kind, name)

    return value
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  names(): string[] {
    return [...this.entries.keys()]
  }
}
