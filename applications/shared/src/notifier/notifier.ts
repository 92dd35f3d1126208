import type { Logger } from '../lib/logger';
import type { Track } from '../types';

export type NotificationEvent =
  | { type: 'trackChange'; track: Track }
  | { type: 'pause'; track: Track }
  | { type: 'resume'; track: Track }
  | { type: 'error'; track: Track | null; reason: string };

/**
 * Receives playback events for the user (a toast, a desktop notification).
 * Delivery is best effort.
 */
export interface Notifier {
  notify(event: NotificationEvent): void | Promise<void>;
}

/**
 * Hand an event to the notifier; sync throws and rejections are logged and
 * otherwise ignored.
 */
export function deliverNotification(notifier: Notifier, event: NotificationEvent, log: Logger): void {
  try {
    const result = notifier.notify(event);
    Promise.resolve(result).catch((error: unknown) => {
      log.warn(`Notifier rejected ${event.type} notification`, error);
    });
  } catch (error) {
    log.warn(`Notifier threw on ${event.type} notification`, error);
  }
}
