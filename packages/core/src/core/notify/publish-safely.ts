import type { Logger } from "@palisade/logger"
import type { NotificationSink } from "../../ports/notification-sink"

/**
 * Publishes to an optional sink. A failing sink is logged, never rethrown.
 */
export async function publishSafely<E>(
  sink: NotificationSink<E> | undefined,
  event: E,
  logger: Logger,
): Promise<void> {
  if (!sink) return

  try {
    await sink.publish(event)
  } catch (err) {
    logger.warn("Notification sink rejected an event", { err })
  }
}
