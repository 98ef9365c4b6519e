export { InMemoryMutex, createMutex } from "./adapters/memory/in-memory-mutex"
export { tryWithLock, withLock } from "./core/with-lock"
export type { AcquireOptions, Mutex } from "./ports/mutex"
export type { MutexLease } from "./ports/mutex-lease"
