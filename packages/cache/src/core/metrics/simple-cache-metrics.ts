import type {
  CacheCounter,
  CacheMetrics,
  CacheMetricsGraph,
  CacheMetricTotals,
} from "../../ports/cache-metrics"

export class SimpleCacheMetrics implements CacheMetrics {
  private readonly perKey = new Map<CacheCounter, Map<string, number>>()
  private cleared = 0

  constructor(readonly cacheName: string) {}

  recordHit(key: string): void {
    this.increment("hits", key)
  }

  recordMiss(key: string): void {
    this.increment("misses", key)
  }

  recordPut(key: string): void {
    this.increment("puts", key)
  }

  recordEviction(key: string): void {
    this.increment("evictions", key)
  }

  recordExpiration(key: string): void {
    this.increment("expirations", key)
  }

  recordClear(count: number): void {
    this.cleared += count
  }

  totals(): CacheMetricTotals {
    return {
      hits: this.total("hits"),
      misses: this.total("misses"),
      puts: this.total("puts"),
      evictions: this.total("evictions"),
      expirations: this.total("expirations"),
      cleared: this.cleared,
    }
  }

  hitRate(): number {
    const hits = this.total("hits")
    const reads = hits + this.total("misses")

    return reads === 0 ? 0 : (hits / reads) * 100
  }

  reset(): void {
    this.perKey.clear()
    this.cleared = 0
  }

  buildGraph(): CacheMetricsGraph {
    return {
      cacheName: this.cacheName,
      totals: { ...this.totals(), hitRate: this.hitRate() },
      operations: {
        hits: this.byKey("hits"),
        misses: this.byKey("misses"),
        puts: this.byKey("puts"),
        evictions: this.byKey("evictions"),
        expirations: this.byKey("expirations"),
      },
    }
  }

  private increment(counter: CacheCounter, key: string): void {
    let counts = this.perKey.get(counter)

    if (!counts) {
      counts = new Map()
      this.perKey.set(counter, counts)
    }

    counts.set(key, (counts.get(key) ?? 0) + 1)
  }

  private total(counter: CacheCounter): number {
    let sum = 0

    for (const n of this.perKey.get(counter)?.values() ?? []) sum += n

    return sum
  }

  private byKey(counter: CacheCounter): Record<string, number> {
    return Object.fromEntries(this.perKey.get(counter) ?? [])
  }
}
