import { getLogger, type Logger } from '@eventide/logger';

import type { HandlerResult } from '../handlers/event-handler.js';

import type { EventMiddleware, MiddlewareContext, NextFn } from './pipeline.js';

export interface LoggingMiddlewareOptions {
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
}

export class LoggingMiddleware implements EventMiddleware {
  readonly name = 'logging';
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: LoggingMiddlewareOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger('LoggingMiddleware');
  }

  async process(context: MiddlewareContext, next: NextFn): Promise<HandlerResult> {
    const { event } = context;
    const fields = {
      eventId: event.eventId,
      eventType: event.eventType,
      aggregateId: event.aggregateId,
      correlationId: event.correlationId,
      handler: context.handlerName,
    };
    const startedAt = this.now();
    this.logger.debug(fields, 'Handling event');

    const result = await next(context);

    const durationMs = this.now() - startedAt;
    if (result.isOk()) {
      this.logger.info({ ...fields, durationMs }, 'Event handled');
    } else {
      this.logger.warn({ ...fields, durationMs, error: result.error }, 'Event handler failed');
    }
    return result;
  }
}
