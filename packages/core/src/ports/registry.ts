/**
 * Named instances owned by the host (backends, resolvers, key generators).
 */
export interface Registry<T> {
  /** Adds `value` under `name`. A later registration replaces an earlier one. */
  register(name: string, value: T): void
  get(name: string): T | undefined

  /** @throws NotFoundError when nothing is registered under `name`. */
  require(name: string): T
  has(name: string): boolean
  names(): string[]
}
