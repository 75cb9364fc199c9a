import { DomainEvent } from '@eventide/core';

import type { MiddlewareContext } from '../middleware/pipeline.js';

export class OrderPlaced extends DomainEvent<{ total: number }> {}

export class RushOrderPlaced extends OrderPlaced {}

export class UserRegistered extends DomainEvent<{ email: string }> {}

export function orderPlaced(aggregateId = 'order-1', options: { version?: number; topic?: string; total?: number } = {}) {
  return new OrderPlaced({
    aggregateId,
    aggregateType: 'Order',
    version: options.version ?? 1,
    topic: options.topic,
    payload: { total: options.total ?? 25 },
  });
}

export function userRegistered(aggregateId = 'user-1', topic?: string) {
  return new UserRegistered({
    aggregateId,
    aggregateType: 'User',
    topic,
    payload: { email: 'someone@example.com' },
  });
}

export function contextFor(event: DomainEvent, overrides: Partial<MiddlewareContext> = {}): MiddlewareContext {
  return { event, metadata: {}, handlerName: 'test-handler', ...overrides };
}
