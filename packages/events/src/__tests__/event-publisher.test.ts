import { ConcurrencyConflictError, type DomainEvent } from '@eventide/core';
import { InMemoryEventStore } from '@eventide/event-store';
import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { EventBus } from '../bus/event-bus.js';
import { EventPublisher } from '../publisher/event-publisher.js';

import { orderPlaced } from './fixtures.js';

function setup() {
  const store = new InMemoryEventStore();
  const bus = new EventBus();
  const dispatched: string[] = [];
  bus.subscribe((event: DomainEvent) => {
    dispatched.push(`${event.aggregateId}@${event.version}`);
    return ok(undefined);
  });
  const publisher = new EventPublisher({ bus, store });
  return { store, bus, publisher, dispatched };
}

async function storedVersions(store: InMemoryEventStore, aggregateId: string): Promise<number[]> {
  const events = (await store.getEvents({ aggregateId }))._unsafeUnwrap();
  return events.map((event) => event.version);
}

describe('EventPublisher', () => {
  describe('buffered publishing', () => {
    it('holds added events until publishPending', async () => {
      const { store, publisher, dispatched } = setup();

      publisher.add(orderPlaced('order-1', { version: 1 }));
      publisher.addMany([orderPlaced('order-1', { version: 2 }), orderPlaced('order-2', { version: 1 })]);

      expect(publisher.pendingCount).toBe(3);
      expect(dispatched).toEqual([]);
      expect(await storedVersions(store, 'order-1')).toEqual([]);
    });

    it('persists and dispatches pending events in order, then has nothing left', async () => {
      const { store, publisher, dispatched } = setup();
      publisher.addMany([
        orderPlaced('order-1', { version: 1 }),
        orderPlaced('order-1', { version: 2 }),
        orderPlaced('order-2', { version: 1 }),
      ]);

      const reports = (await publisher.publishPending())._unsafeUnwrap();

      expect(reports.map((report) => report.result.isOk())).toEqual([true, true, true]);
      expect(dispatched).toEqual(['order-1@1', 'order-1@2', 'order-2@1']);
      expect(await storedVersions(store, 'order-1')).toEqual([1, 2]);
      expect(publisher.pendingCount).toBe(0);

      expect((await publisher.publishPending())._unsafeUnwrap()).toEqual([]);
      expect(dispatched).toHaveLength(3);
    });

    it('skips dispatch for events that could not be stored and continues with the rest', async () => {
      const { publisher, dispatched } = setup();
      publisher.addMany([
        orderPlaced('order-1', { version: 1 }),
        orderPlaced('order-1', { version: 3 }),
        orderPlaced('order-2', { version: 1 }),
      ]);

      const reports = (await publisher.publishPending())._unsafeUnwrap();

      expect(reports[1]?.result._unsafeUnwrapErr()).toBeInstanceOf(ConcurrencyConflictError);
      expect(dispatched).toEqual(['order-1@1', 'order-2@1']);
    });

    it('leaves events added by handlers for the next call', async () => {
      const store = new InMemoryEventStore();
      const bus = new EventBus();
      const publisher = new EventPublisher({ bus, store });
      bus.subscribe((event: DomainEvent) => {
        if (event.aggregateId === 'order-1') {
          publisher.add(orderPlaced('order-follow-up'));
        }
        return ok(undefined);
      });
      publisher.add(orderPlaced('order-1'));

      await publisher.publishPending();

      expect(publisher.pendingCount).toBe(1);
    });
  });

  describe('immediate publishing', () => {
    it('persists before dispatching', async () => {
      const store = new InMemoryEventStore();
      const bus = new EventBus();
      const versionsSeenByHandler: number[] = [];
      bus.subscribe(async (event: DomainEvent) => {
        const version = await store.getCurrentVersion(event.aggregateId);
        versionsSeenByHandler.push(version._unsafeUnwrap());
        return ok(undefined);
      });
      const publisher = new EventPublisher({ bus, store });

      const outcome = await publisher.publish(orderPlaced('order-1'));

      expect(outcome.isOk()).toBe(true);
      expect(versionsSeenByHandler).toEqual([1]);
    });

    it('returns the store error and does not dispatch a conflicting event', async () => {
      const { publisher, dispatched } = setup();

      const result = await publisher.publish(orderPlaced('order-1', { version: 2 }));

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ConcurrencyConflictError);
      expect(error.message).toBe('Concurrency conflict for aggregate order-1: expected version 1, got 2');
      expect(dispatched).toEqual([]);
    });

    it('reports each event of publishMany separately', async () => {
      const { publisher, dispatched } = setup();

      const reports = (
        await publisher.publishMany([
          orderPlaced('order-1', { version: 1 }),
          orderPlaced('order-1', { version: 1 }),
          orderPlaced('order-1', { version: 2 }),
        ])
      )._unsafeUnwrap();

      expect(reports.map((report) => report.result.isOk())).toEqual([true, false, true]);
      expect(dispatched).toEqual(['order-1@1', 'order-1@2']);
    });

    it('only dispatches when there is no store', async () => {
      const bus = new EventBus();
      const seen: string[] = [];
      bus.subscribe((event: DomainEvent) => {
        seen.push(event.aggregateId);
        return ok(undefined);
      });
      const publisher = new EventPublisher({ bus });

      await publisher.publish(orderPlaced('order-1', { version: 7 }));

      expect(seen).toEqual(['order-1']);
    });
  });

  describe('commit', () => {
    it('stores a batch atomically and dispatches it', async () => {
      const { store, publisher, dispatched } = setup();

      const outcomes = await publisher.commit([orderPlaced('order-1', { version: 1 }), orderPlaced('order-1', { version: 2 })]);

      expect(outcomes._unsafeUnwrap()).toHaveLength(2);
      expect(dispatched).toEqual(['order-1@1', 'order-1@2']);
      expect(await storedVersions(store, 'order-1')).toEqual([1, 2]);
    });

    it('stores and dispatches nothing when any event conflicts', async () => {
      const { store, publisher, dispatched } = setup();

      const result = await publisher.commit([orderPlaced('order-1', { version: 1 }), orderPlaced('order-1', { version: 3 })]);

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(ConcurrencyConflictError);
      expect(dispatched).toEqual([]);
      expect(await storedVersions(store, 'order-1')).toEqual([]);
    });
  });
});
