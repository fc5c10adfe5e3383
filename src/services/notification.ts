import { typedLogger } from '@/lib/typed-logger';
import { GameNotification, NotificationSink } from '@/types';

/**
 * Default sink: notifications are written to the game log. Push or in-app
 * delivery plugs in behind the same interface.
 */
export class LoggingNotificationSink implements NotificationSink {
  async notify(notification: GameNotification): Promise<void> {
    typedLogger.info('Notification', {
      kind: notification.kind,
      characterId: notification.characterId,
      title: notification.title,
      message: notification.message,
    });
  }
}

/**
 * Delivery never blocks or fails a game operation.
 */
export async function safeNotify(sink: NotificationSink, notification: GameNotification): Promise<void> {
  try {
    await sink.notify(notification);
  } catch (error) {
    typedLogger.warn('Notification delivery failed', {
      kind: notification.kind,
      characterId: notification.characterId,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
