import { CircuitOpenError, type DomainEvent, type EventClass } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import { CircuitBreakerRegistry, type CircuitBreakerOptions, type CircuitState } from '@eventide/resilience';
import { err } from 'neverthrow';

import type { HandlerResult } from '../handlers/event-handler.js';

import type { EventMiddleware, MiddlewareContext, NextFn } from './pipeline.js';

export interface CircuitBreakerMiddlewareOptions extends CircuitBreakerOptions {
  /** Only these event classes are guarded; others pass straight through. */
  eventClasses?: readonly EventClass[] | undefined;
  /** Breaker key for a call. Defaults to the event type. */
  keyOf?: ((context: MiddlewareContext) => string) | undefined;
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
}

/**
 * Rejects calls for a key whose breaker is open, without invoking the rest of
 * the pipeline. Breakers are created lazily per key and owned by this
 * middleware instance.
 */
export class CircuitBreakerMiddleware implements EventMiddleware {
  readonly name = 'circuit-breaker';
  private readonly registry: CircuitBreakerRegistry;
  private readonly eventClasses: readonly EventClass[] | undefined;
  private readonly keyOf: (context: MiddlewareContext) => string;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerMiddlewareOptions = {}) {
    const { eventClasses, keyOf, now, logger, ...thresholds } = options;
    this.logger = logger ?? getLogger('CircuitBreakerMiddleware');
    this.eventClasses = eventClasses;
    this.keyOf = keyOf ?? ((context) => context.event.eventType);
    this.registry = new CircuitBreakerRegistry({
      ...thresholds,
      now,
      onTransition: ({ key, from, to, state }) => {
        const fields = { key, from, to, failureCount: state.failureCount };
        if (to === 'open') {
          this.logger.warn(fields, 'Circuit breaker opened');
        } else {
          this.logger.info(fields, `Circuit breaker ${to}`);
        }
      },
    });
  }

  async process(context: MiddlewareContext, next: NextFn): Promise<HandlerResult> {
    if (!this.guards(context.event)) {
      return next(context);
    }

    const key = this.keyOf(context);
    if (!(await this.registry.canExecute(key))) {
      this.logger.debug({ key, eventId: context.event.eventId, handler: context.handlerName }, 'Call rejected by open circuit');
      return err(new CircuitOpenError(key));
    }

    let result: HandlerResult;
    try {
      result = await next(context);
    } catch (error) {
      // Every admitted call must be recorded, even one that throws
      await this.registry.recordFailure(key);
      throw error;
    }

    if (result.isOk()) {
      await this.registry.recordSuccess(key);
    } else {
      await this.registry.recordFailure(key);
    }
    return result;
  }

  getState(key: string): CircuitState | undefined {
    return this.registry.get(key);
  }

  states(): ReadonlyMap<string, CircuitState> {
    return this.registry.asReadonlyMap();
  }

  reset(key: string): Promise<void> {
    return this.registry.reset(key);
  }

  private guards(event: DomainEvent): boolean {
    return this.eventClasses === undefined || this.eventClasses.some((eventClass) => event instanceof eventClass);
  }
}
