import type { DomainEvent, EventClass } from '@eventide/core';

import type { ResolvedHandler } from '../handlers/event-handler.js';

/**
 * Dispatch order across subscriptions. Lower runs first; subscriptions with
 * the same priority run in subscription order.
 */
export const EventPriority = {
  HIGH: 0,
  NORMAL: 1,
  LOW: 2,
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

export interface SubscribeOptions<TEvent extends DomainEvent = DomainEvent> {
  /** Instances of this class (or a subclass) are delivered. */
  eventClass?: EventClass<TEvent> | undefined;
  /** Tested against `event.topic`; events without a topic never match. */
  topicPattern?: RegExp | string | undefined;
  priority?: EventPriority | undefined;
  /** Label used in logs and results. Defaults to the handler's name. */
  name?: string | undefined;
}

export interface Subscription {
  readonly id: string;
  readonly name: string;
  readonly handler: ResolvedHandler;
  readonly topicPattern: RegExp | undefined;
  readonly priority: EventPriority;
}

export function toTopicPattern(pattern: RegExp | string | undefined): RegExp | undefined {
  if (pattern === undefined) return undefined;
  return typeof pattern === 'string' ? new RegExp(pattern) : pattern;
}

export function matchesTopic(pattern: RegExp | undefined, topic: string | undefined): boolean {
  if (!pattern) return true;
  if (topic === undefined) return false;
  // A global or sticky pattern keeps lastIndex between calls
  pattern.lastIndex = 0;
  // Matches are anchored at the start of the topic
  const match = pattern.exec(topic);
  return match !== null && match.index === 0;
}

export function matches(subscription: Subscription, event: DomainEvent): boolean {
  return matchesTopic(subscription.topicPattern, event.topic) && subscription.handler.accepts(event);
}
