import { getErrorMessage, wrapError } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import {
  DEFAULT_NOTIFICATION_CHANNEL,
  EventNotificationSchema,
  type ChangeNotifier,
  type EventNotification,
  type NotificationListener,
  type Unlisten,
} from './change-notifier.js';

export interface PgNotificationMessage {
  channel: string;
  payload?: string | undefined;
}

/**
 * The parts of a pg PoolClient used for LISTEN.
 */
export interface PgListenClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  on(event: 'notification', listener: (message: PgNotificationMessage) => void): unknown;
  removeListener(event: 'notification', listener: (message: PgNotificationMessage) => void): unknown;
  release(error?: Error | boolean): void;
}

/**
 * The parts of a pg Pool used by the notifier. A `pg.Pool` satisfies it.
 */
export interface PgNotificationPool {
  query(text: string, values?: unknown[]): Promise<unknown>;
  connect(): Promise<PgListenClient>;
}

export interface PgChangeNotifierOptions {
  pool: PgNotificationPool;
  channel?: string | undefined;
  logger?: Logger | undefined;
}

const CHANNEL_PATTERN = /^[a-z_][a-z0-9_]*$/;

/**
 * PostgreSQL LISTEN/NOTIFY channel. Each listen() checks out a dedicated
 * connection that stays open until the returned unlisten is called.
 */
export class PgChangeNotifier implements ChangeNotifier {
  private readonly pool: PgNotificationPool;
  private readonly channel: string;
  private readonly logger: Logger;

  constructor(options: PgChangeNotifierOptions) {
    const channel = options.channel ?? DEFAULT_NOTIFICATION_CHANNEL;
    if (!CHANNEL_PATTERN.test(channel)) {
      throw new Error(`Invalid notification channel name: ${channel}`);
    }
    this.pool = options.pool;
    this.channel = channel;
    this.logger = options.logger ?? getLogger('PgChangeNotifier');
  }

  async notify(notification: EventNotification): Promise<Result<void, Error>> {
    try {
      await this.pool.query('SELECT pg_notify($1, $2)', [this.channel, JSON.stringify(notification)]);
      return ok();
    } catch (error) {
      this.logger.warn({ error, eventId: notification.event_id }, 'Failed to send change notification');
      return wrapError(error, 'Failed to send change notification');
    }
  }

  async listen(listener: NotificationListener): Promise<Result<Unlisten, Error>> {
    let client: PgListenClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      return wrapError(error, 'Failed to acquire listen connection');
    }

    const onNotification = (message: PgNotificationMessage) => {
      if (message.channel !== this.channel) return;
      const parsed = this.parse(message.payload);
      if (!parsed) return;
      try {
        listener(parsed);
      } catch (error) {
        this.logger.error({ error, eventId: parsed.event_id }, 'Change listener failed');
      }
    };

    try {
      client.on('notification', onNotification);
      await client.query(`LISTEN ${this.channel}`);
    } catch (error) {
      client.removeListener('notification', onNotification);
      client.release(true);
      return wrapError(error, `Failed to LISTEN on ${this.channel}`);
    }

    this.logger.debug(`Listening on channel ${this.channel}`);

    let released = false;
    const unlisten: Unlisten = async () => {
      if (released) return;
      released = true;
      client.removeListener('notification', onNotification);
      try {
        await client.query(`UNLISTEN ${this.channel}`);
        client.release();
      } catch (error) {
        this.logger.warn({ error }, `Failed to UNLISTEN on ${this.channel}`);
        client.release(true);
      }
    };
    return ok(unlisten);
  }

  private parse(payload: string | undefined): EventNotification | undefined {
    if (payload === undefined) return undefined;
    try {
      const result = EventNotificationSchema.safeParse(JSON.parse(payload));
      if (result.success) return result.data;
      this.logger.warn({ payload }, 'Ignoring malformed change notification');
    } catch (error) {
      this.logger.warn({ payload, reason: getErrorMessage(error) }, 'Ignoring non-JSON change notification');
    }
    return undefined;
  }
}
