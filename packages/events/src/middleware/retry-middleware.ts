import { getLogger, type Logger } from '@eventide/logger';
import { executeWithRetry, RetryPolicy, type RetryDelay, type RetryOptions } from '@eventide/resilience';

import type { HandlerResult } from '../handlers/event-handler.js';

import type { EventMiddleware, MiddlewareContext, NextFn } from './pipeline.js';

export interface RetryMiddlewareOptions extends RetryOptions {
  delay?: RetryDelay | undefined;
  logger?: Logger | undefined;
}

/**
 * Re-invokes the rest of the pipeline on retryable failures with exponential
 * backoff. Gives up after maxRetries retries; the last failure is returned.
 */
export class RetryMiddleware implements EventMiddleware {
  readonly name = 'retry';
  readonly policy: RetryPolicy;
  private readonly delay: RetryDelay | undefined;
  private readonly logger: Logger;

  constructor(options: RetryMiddlewareOptions = {}) {
    const { delay, logger, ...policyOptions } = options;
    this.policy = new RetryPolicy(policyOptions);
    this.delay = delay;
    this.logger = logger ?? getLogger('RetryMiddleware');
  }

  process(context: MiddlewareContext, next: NextFn): Promise<HandlerResult> {
    return executeWithRetry(() => next(context), {
      policy: this.policy,
      signal: context.signal,
      delay: this.delay,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn(
          {
            eventId: context.event.eventId,
            eventType: context.event.eventType,
            handler: context.handlerName,
            attempt: attempt + 1,
            maxRetries: this.policy.maxRetries,
            delayMs,
            error,
          },
          'Handler failed, retrying'
        );
      },
    });
  }
}
