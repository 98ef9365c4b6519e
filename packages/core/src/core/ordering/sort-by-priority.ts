export type Prioritized<T> = Readonly<{
  value: T

  /** Lower runs first. Default: 0 */
  priority?: number
}>

/**
 * Stable sort by explicit priority; equal priorities keep their given order.
 */
export function sortByPriority<T>(items: readonly Prioritized<T>[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => (a.item.priority ?? 0) - (b.item.priority ?? 0) || a.index - b.index)
    .map(({ item }) => item.value)
}
