import type { AcquireOptions, Mutex } from "../../ports/mutex"
import type { MutexLease } from "../../ports/mutex-lease"
import { InMemoryMutexLease } from "./in-memory-mutex-lease"

type Waiter = {
  grant: (lease: MutexLease) => void
}

export class InMemoryMutex implements Mutex {
  private locked = false
  private readonly waiters: Waiter[] = []

  acquire(opts: AcquireOptions = {}): Promise<MutexLease> {
    const { signal } = opts

    if (signal?.aborted) return Promise.reject(signal.reason)

    const immediate = this.tryAcquire()
    if (immediate) return Promise.resolve(immediate)

    return new Promise<MutexLease>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) this.waiters.splice(index, 1)

        reject(signal?.reason)
      }

      const waiter: Waiter = {
        grant: (lease) => {
          signal?.removeEventListener("abort", onAbort)
          resolve(lease)
        },
      }

      this.waiters.push(waiter)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  tryAcquire(): MutexLease | null {
    if (this.locked) return null

    this.locked = true

    return this.createLease()
  }

  isLocked(): boolean {
    return this.locked
  }

  pendingCount(): number {
    return this.waiters.length
  }

  private createLease(): MutexLease {
    return new InMemoryMutexLease(() => this.handOff())
  }

  private handOff(): void {
    const next = this.waiters.shift()

    if (next) {
      next.grant(this.createLease())
      return
    }

    this.locked = false
  }
}

export function createMutex(): Mutex {
  return new InMemoryMutex()
}
