import type { MutexLease } from "../../ports/mutex-lease"

export class InMemoryMutexLease implements MutexLease {
  private released = false

  constructor(private readonly onRelease: () => void) {}

  release(): void {
    if (this.released) return

    this.released = true
    this.onRelease()
  }
}
