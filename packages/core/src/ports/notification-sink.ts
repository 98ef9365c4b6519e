/**
 * Receives store lifecycle notifications (hit, miss, allowed, denied, ...).
 *
 * @remarks
 * Optional everywhere. A missing sink, or one that throws, never changes
 * what a store returns.
 */
export interface NotificationSink<E> {
  publish(event: E): void | Promise<void>
}
