export type CacheCounter = "hits" | "misses" | "puts" | "evictions" | "expirations"

export type CacheMetricTotals = Readonly<Record<CacheCounter, number>> &
  Readonly<{
    /** Entries removed by `clear()`. */
    cleared: number
  }>

export type CacheMetricsGraph = Readonly<{
  cacheName: string
  totals: CacheMetricTotals & Readonly<{ hitRate: number }>

  /** Per-key counts, keys rendered with `describeKey`. */
  operations: Readonly<Record<CacheCounter, Readonly<Record<string, number>>>>
}>

export interface CacheMetrics {
  recordHit(key: string): void
  recordMiss(key: string): void
  recordPut(key: string): void
  recordEviction(key: string): void
  recordExpiration(key: string): void
  recordClear(count: number): void

  totals(): CacheMetricTotals

  /** Hits as a percentage of reads; 0 before the first read. */
  hitRate(): number

  reset(): void
  buildGraph(): CacheMetricsGraph
}
