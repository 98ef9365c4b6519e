import type { MutexLease } from "./mutex-lease"

export type AcquireOptions = {
  /** Abandons the wait. Has no effect once the mutex is held. */
  signal?: AbortSignal
}

/**
 * A non-reentrant critical section for a single owner object.
 *
 * @remarks
 * Async code interleaves at every `await`, so a read-then-write on shared
 * state (capacity check + insert, count check + increment) must hold the
 * owner's mutex for its whole duration. One mutex guards one store
 * instance; unrelated stores never contend.
 *
 * Acquiring again from inside the section deadlocks. Code that needs to
 * reuse logic under the lock calls unlocked private helpers instead.
 */
export interface Mutex {
  /**
   * Waits for the mutex. Waiters are served in arrival order.
   *
   * @throws the signal's reason when `signal` aborts before acquisition.
   */
  acquire(opts?: AcquireOptions): Promise<MutexLease>

  /** Takes the mutex only if it is free right now. */
  tryAcquire(): MutexLease | null

  isLocked(): boolean

  /** Number of callers currently waiting. */
  pendingCount(): number
}
