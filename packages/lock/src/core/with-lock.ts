import type { AcquireOptions, Mutex } from "../ports/mutex"

/**
 * Runs `fn` while holding `mutex`, releasing it whether `fn` resolves or throws.
 */
export async function withLock<T>(
  mutex: Mutex,
  fn: () => Promise<T> | T,
  opts?: AcquireOptions,
): Promise<T> {
  const lease = await mutex.acquire(opts)

  try {
    return await fn()
  } finally {
    lease.release()
  }
}

/**
 * Runs `fn` only if `mutex` is free right now.
 *
 * @returns `null` without calling `fn` when the mutex is held.
 */
export async function tryWithLock<T>(mutex: Mutex, fn: () => Promise<T> | T): Promise<T | null> {
  const lease = mutex.tryAcquire()

  if (!lease) return null

  try {
    return await fn()
  } finally {
    lease.release()
  }
}
