import { EventEmitter } from 'node:events';

import { describe, expect, it, vi } from 'vitest';

import { toNotification, type EventNotification } from '../notifications/change-notifier.js';
import { InProcessChangeNotifier } from '../notifications/in-process-notifier.js';
import {
  PgChangeNotifier,
  type PgListenClient,
  type PgNotificationMessage,
  type PgNotificationPool,
} from '../notifications/pg-notifier.js';

import { opened } from './fixtures.js';

describe('InProcessChangeNotifier', () => {
  it('delivers asynchronously to every listener', async () => {
    const notifier = new InProcessChangeNotifier();
    const received: string[] = [];
    await notifier.listen((notification) => received.push(`a:${notification.aggregate_id}`));
    await notifier.listen((notification) => received.push(`b:${notification.aggregate_id}`));

    await notifier.notify(toNotification(opened('acc-1')));
    expect(received).toEqual([]);

    await vi.waitFor(() => expect(received).toEqual(['a:acc-1', 'b:acc-1']));
  });

  it('keeps delivering when one listener throws', async () => {
    const notifier = new InProcessChangeNotifier();
    const received: string[] = [];
    await notifier.listen(() => {
      throw new Error('listener bug');
    });
    await notifier.listen((notification) => received.push(notification.event_type));

    await notifier.notify(toNotification(opened('acc-1')));

    await vi.waitFor(() => expect(received).toEqual(['AccountOpened']));
  });

  it('stops delivering after unlisten', async () => {
    const notifier = new InProcessChangeNotifier();
    const listener = vi.fn();
    const unlisten = (await notifier.listen(listener))._unsafeUnwrap();

    await unlisten();
    await notifier.notify(toNotification(opened('acc-1')));
    await new Promise((resolve) => setImmediate(resolve));

    expect(listener).not.toHaveBeenCalled();
    expect(notifier.listenerCount).toBe(0);
  });
});

class FakeListenClient extends EventEmitter implements PgListenClient {
  readonly queries: string[] = [];
  readonly releases: (Error | boolean | undefined)[] = [];

  query(text: string): Promise<unknown> {
    this.queries.push(text);
    return Promise.resolve({ rows: [] });
  }

  release(error?: Error | boolean): void {
    this.releases.push(error);
  }

  emitNotification(message: PgNotificationMessage): void {
    this.emit('notification', message);
  }
}

class FakePool implements PgNotificationPool {
  readonly client = new FakeListenClient();
  readonly queries: { text: string; values: unknown[] | undefined }[] = [];

  query(text: string, values?: unknown[]): Promise<unknown> {
    this.queries.push({ text, values });
    return Promise.resolve({ rows: [] });
  }

  connect(): Promise<PgListenClient> {
    return Promise.resolve(this.client);
  }
}

describe('PgChangeNotifier', () => {
  it('sends notifications through pg_notify on the channel', async () => {
    const pool = new FakePool();
    const notifier = new PgChangeNotifier({ pool, channel: 'account_events' });
    const notification = toNotification(opened('acc-1'));

    (await notifier.notify(notification))._unsafeUnwrap();

    expect(pool.queries).toEqual([
      { text: 'SELECT pg_notify($1, $2)', values: ['account_events', JSON.stringify(notification)] },
    ]);
  });

  it('listens on a dedicated connection and parses payloads', async () => {
    const pool = new FakePool();
    const notifier = new PgChangeNotifier({ pool });
    const received: EventNotification[] = [];

    (await notifier.listen((notification) => received.push(notification)))._unsafeUnwrap();
    const notification = toNotification(opened('acc-1'));
    pool.client.emitNotification({ channel: 'domain_events', payload: JSON.stringify(notification) });
    pool.client.emitNotification({ channel: 'other_channel', payload: JSON.stringify(notification) });
    pool.client.emitNotification({ channel: 'domain_events', payload: 'not json' });
    pool.client.emitNotification({ channel: 'domain_events', payload: '{"event_id":"x"}' });

    expect(pool.client.queries).toEqual(['LISTEN domain_events']);
    expect(received).toEqual([notification]);
  });

  it('unlistens and releases the connection', async () => {
    const pool = new FakePool();
    const notifier = new PgChangeNotifier({ pool });
    const listener = vi.fn();
    const unlisten = (await notifier.listen(listener))._unsafeUnwrap();

    await unlisten();
    await unlisten();
    pool.client.emitNotification({ channel: 'domain_events', payload: JSON.stringify(toNotification(opened('acc-1'))) });

    expect(pool.client.queries).toEqual(['LISTEN domain_events', 'UNLISTEN domain_events']);
    expect(pool.client.releases).toEqual([undefined]);
    expect(listener).not.toHaveBeenCalled();
  });

  it('returns an error when pg_notify fails', async () => {
    const pool = new FakePool();
    pool.query = () => Promise.reject(new Error('connection reset'));
    const notifier = new PgChangeNotifier({ pool });

    const result = await notifier.notify(toNotification(opened('acc-1')));

    expect(result._unsafeUnwrapErr().message).toContain('connection reset');
  });

  it('rejects channel names that are not plain identifiers', () => {
    expect(() => new PgChangeNotifier({ pool: new FakePool(), channel: 'events; drop table x' })).toThrow(
      'Invalid notification channel name: events; drop table x'
    );
  });
});
