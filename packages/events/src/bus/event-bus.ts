import { getErrorMessage, HandlerError, isKindedError, type DomainEvent, type EventClass } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import {
  resolveHandler,
  type EventHandler,
  type EventHandlerFn,
  type EventMetadata,
  type HandlerResult,
} from '../handlers/event-handler.js';
import { composePipeline, type EventMiddleware } from '../middleware/pipeline.js';

import {
  EventPriority,
  matches,
  toTopicPattern,
  type SubscribeOptions,
  type Subscription,
} from './subscription.js';

export interface EventBusOptions {
  /** Wrapped around every handler call; the first entry is outermost. */
  middlewares?: readonly EventMiddleware[] | undefined;
  logger?: Logger | undefined;
}

export interface PublishOptions {
  signal?: AbortSignal | undefined;
}

export interface HandlerOutcome {
  subscriptionId: string;
  handlerName: string;
  result: HandlerResult;
}

export interface PublishOutcome {
  event: DomainEvent;
  /** One entry per matching subscription, in dispatch order. */
  results: HandlerOutcome[];
}

export interface UnsubscribeFilters {
  eventClass?: EventClass | undefined;
  /** Compared by pattern source. */
  topicPattern?: RegExp | string | undefined;
}

/**
 * In-process dispatcher. Matching subscriptions for an event are invoked one
 * after another in priority order, each through the middleware pipeline.
 *
 * A failing handler is logged and recorded in the outcome; it never stops the
 * remaining handlers and never fails `publish` itself.
 */
export class EventBus {
  private subscriptions: Subscription[] = [];
  private readonly middlewares: EventMiddleware[];
  private readonly logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.middlewares = [...(options.middlewares ?? [])];
    this.logger = options.logger ?? getLogger('EventBus');
  }

  get subscriptionCount(): number {
    return this.subscriptions.length;
  }

  /**
   * Register a handler. Returns a function that removes exactly this
   * subscription.
   */
  subscribe<TEvent extends DomainEvent>(
    handler: EventHandler<TEvent> | EventHandlerFn<TEvent>,
    options: SubscribeOptions<TEvent> = {}
  ): () => void {
    const resolved = resolveHandler(handler, options.eventClass);
    const subscription: Subscription = {
      id: uuidv4(),
      name: options.name ?? resolved.name,
      handler: resolved,
      topicPattern: toTopicPattern(options.topicPattern),
      priority: options.priority ?? EventPriority.NORMAL,
    };

    // Insert after the last subscription of the same or higher priority
    const index = this.subscriptions.findIndex((existing) => existing.priority > subscription.priority);
    const next = [...this.subscriptions];
    next.splice(index === -1 ? next.length : index, 0, subscription);
    this.subscriptions = next;

    this.logger.debug(
      {
        subscriptionId: subscription.id,
        handler: subscription.name,
        eventClass: resolved.eventClass?.name,
        topicPattern: subscription.topicPattern?.source,
        priority: subscription.priority,
      },
      'Handler subscribed'
    );

    return () => {
      this.remove((existing) => existing.id === subscription.id);
    };
  }

  /**
   * Remove every subscription of `handler` that also matches the given
   * filters. Returns how many were removed.
   */
  unsubscribe<TEvent extends DomainEvent>(
    handler: EventHandler<TEvent> | EventHandlerFn<TEvent>,
    filters: UnsubscribeFilters = {}
  ): number {
    const topicSource = toTopicPattern(filters.topicPattern)?.source;
    return this.remove(
      (existing) =>
        existing.handler.ref === handler &&
        (filters.eventClass === undefined || existing.handler.eventClass === filters.eventClass) &&
        (topicSource === undefined || existing.topicPattern?.source === topicSource)
    );
  }

  clear(): void {
    this.subscriptions = [];
  }

  async publish(
    event: DomainEvent,
    metadata: EventMetadata = {},
    options: PublishOptions = {}
  ): Promise<Result<PublishOutcome, never>> {
    // Snapshot the list so (un)subscribing from inside a handler does not
    // change this dispatch
    const targets = this.subscriptions.filter((subscription) => matches(subscription, event));
    if (targets.length === 0) {
      this.logger.debug({ eventId: event.eventId, eventType: event.eventType }, 'No handlers for event');
      return ok({ event, results: [] });
    }

    const results: HandlerOutcome[] = [];
    for (const subscription of targets) {
      const result = await this.dispatch(subscription, event, metadata, options.signal);
      if (result.isErr()) {
        this.logger.error(
          {
            eventId: event.eventId,
            eventType: event.eventType,
            handler: subscription.name,
            error: result.error,
          },
          'Event handler failed'
        );
      }
      results.push({ subscriptionId: subscription.id, handlerName: subscription.name, result });
    }
    return ok({ event, results });
  }

  /** Publish each event in order. One event's handler failures do not stop the rest. */
  async publishMany(
    events: readonly DomainEvent[],
    metadata: EventMetadata = {},
    options: PublishOptions = {}
  ): Promise<Result<PublishOutcome[], never>> {
    const outcomes: PublishOutcome[] = [];
    for (const event of events) {
      const outcome = await this.publish(event, metadata, options);
      if (outcome.isOk()) {
        outcomes.push(outcome.value);
      }
    }
    return ok(outcomes);
  }

  private async dispatch(
    subscription: Subscription,
    event: DomainEvent,
    metadata: EventMetadata,
    signal: AbortSignal | undefined
  ): Promise<HandlerResult> {
    const pipeline = composePipeline(this.middlewares, (context) =>
      subscription.handler.invoke(context.event, { metadata: context.metadata, signal: context.signal })
    );
    try {
      return await pipeline({ event, metadata, handlerName: subscription.name, signal });
    } catch (error) {
      // Middleware reports failures as results; a throw still must not reach the publisher
      if (isKindedError(error)) {
        return err(error);
      }
      return err(
        new HandlerError(`Handler ${subscription.name} threw: ${getErrorMessage(error)}`, subscription.name, {
          cause: error,
        })
      );
    }
  }

  private remove(predicate: (subscription: Subscription) => boolean): number {
    const before = this.subscriptions.length;
    this.subscriptions = this.subscriptions.filter((subscription) => !predicate(subscription));
    return before - this.subscriptions.length;
  }
}
