import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { ChangeNotifier, EventNotification, NotificationListener, Unlisten } from './change-notifier.js';

/**
 * Notification channel for a single process (SQLite deployments and tests).
 *
 * Delivery is asynchronous via the microtask queue, so notify() never runs
 * listener code on the caller's stack. Listener exceptions are logged and do
 * not reach the notifier or other listeners.
 */
export class InProcessChangeNotifier implements ChangeNotifier {
  private readonly listeners = new Set<NotificationListener>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger | undefined } = {}) {
    this.logger = options.logger ?? getLogger('InProcessChangeNotifier');
  }

  notify(notification: EventNotification): Promise<Result<void, Error>> {
    const targets = [...this.listeners];
    queueMicrotask(() => {
      for (const listener of targets) {
        try {
          listener(notification);
        } catch (error) {
          this.logger.error({ error, eventId: notification.event_id }, 'Change listener failed');
        }
      }
    });
    return Promise.resolve(ok());
  }

  listen(listener: NotificationListener): Promise<Result<Unlisten, Error>> {
    this.listeners.add(listener);
    const unlisten: Unlisten = () => {
      this.listeners.delete(listener);
      return Promise.resolve();
    };
    return Promise.resolve(ok(unlisten));
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
