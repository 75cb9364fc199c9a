import type { EventStore } from '@eventide/event-store';
import { InMemoryEventStore } from '@eventide/event-store';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { EventBus } from '../bus/event-bus.js';
import {
  CircuitBreakerMiddleware,
  type CircuitBreakerMiddlewareOptions,
} from '../middleware/circuit-breaker-middleware.js';
import { LoggingMiddleware } from '../middleware/logging-middleware.js';
import { MetricsMiddleware, type MetricsMiddlewareOptions } from '../middleware/metrics-middleware.js';
import type { EventMiddleware } from '../middleware/pipeline.js';
import { RetryMiddleware, type RetryMiddlewareOptions } from '../middleware/retry-middleware.js';
import { TimeoutMiddleware, type TimeoutMiddlewareOptions } from '../middleware/timeout-middleware.js';
import { EventPublisher } from '../publisher/event-publisher.js';

export interface EventSystemOptions {
  /** Defaults to an InMemoryEventStore. */
  store?: EventStore | undefined;
  /** Pass `false` to leave a middleware out. Omitted means default options. */
  metrics?: MetricsMiddlewareOptions | false | undefined;
  retry?: RetryMiddlewareOptions | false | undefined;
  circuitBreaker?: CircuitBreakerMiddlewareOptions | false | undefined;
  /** Off unless given. */
  timeout?: TimeoutMiddlewareOptions | undefined;
  logging?: boolean | undefined;
  /** Appended after the built-in middleware, closest to the handler. */
  middlewares?: readonly EventMiddleware[] | undefined;
  logger?: Logger | undefined;
}

export interface EventSystem {
  readonly store: EventStore;
  readonly bus: EventBus;
  readonly publisher: EventPublisher;
  readonly metrics: MetricsMiddleware | undefined;
  readonly retry: RetryMiddleware | undefined;
  readonly circuitBreaker: CircuitBreakerMiddleware | undefined;
}

/**
 * Wire a store, a bus and a publisher together.
 *
 * Middleware order, outermost first: logging, metrics, retry, circuit
 * breaker, timeout, then any custom middleware. Retry wraps the breaker, so
 * each attempt counts towards opening it and an open breaker fails the
 * remaining attempts fast.
 */
export function createEventSystem(options: EventSystemOptions = {}): EventSystem {
  const logger = options.logger ?? getLogger('EventSystem');
  const store = options.store ?? new InMemoryEventStore();

  const metrics = options.metrics === false ? undefined : new MetricsMiddleware(options.metrics);
  const retry = options.retry === false ? undefined : new RetryMiddleware(options.retry);
  const circuitBreaker =
    options.circuitBreaker === false ? undefined : new CircuitBreakerMiddleware(options.circuitBreaker);
  const timeout = options.timeout ? new TimeoutMiddleware(options.timeout) : undefined;
  const logging = options.logging ? new LoggingMiddleware() : undefined;

  const middlewares = [logging, metrics, retry, circuitBreaker, timeout, ...(options.middlewares ?? [])].filter(
    (middleware): middleware is EventMiddleware => middleware !== undefined
  );

  const bus = new EventBus({ middlewares });
  const publisher = new EventPublisher({ bus, store });

  logger.info({ middlewares: middlewares.map((middleware) => middleware.name) }, 'Event system created');
  return { store, bus, publisher, metrics, retry, circuitBreaker };
}

let defaultSystem: EventSystem | undefined;

/**
 * Create the process-wide event system. Fails if one already exists; call
 * resetEventSystem first to replace it.
 */
export function initEventSystem(options: EventSystemOptions = {}): Result<EventSystem, Error> {
  if (defaultSystem) {
    return err(new Error('Event system is already initialized'));
  }
  defaultSystem = createEventSystem(options);
  return ok(defaultSystem);
}

export function getEventSystem(): Result<EventSystem, Error> {
  if (!defaultSystem) {
    return err(new Error('Event system is not initialized; call initEventSystem first'));
  }
  return ok(defaultSystem);
}

/** Forget the process-wide event system, flushing its metrics first. */
export function resetEventSystem(): void {
  defaultSystem?.metrics?.report();
  defaultSystem = undefined;
}
