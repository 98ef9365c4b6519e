export interface MutexLease {
  /**
   * Hand the mutex to the next waiter, or unlock it when nobody waits.
   * Idempotent: only the first call has an effect.
   */
  release(): void
}
