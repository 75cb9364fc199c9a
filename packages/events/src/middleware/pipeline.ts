import type { DomainEvent } from '@eventide/core';

import type { EventMetadata, HandlerResult } from '../handlers/event-handler.js';

/**
 * One handler invocation as seen by middleware.
 */
export interface MiddlewareContext {
  readonly event: DomainEvent;
  readonly metadata: EventMetadata;
  /** Name of the handler at the end of the pipeline. */
  readonly handlerName: string;
  readonly signal?: AbortSignal | undefined;
}

export type NextFn = (context: MiddlewareContext) => Promise<HandlerResult>;

/**
 * A stage around the handler call. A stage may call `next` zero times
 * (short-circuit), once, or several times (retry), and may pass a modified
 * context downstream.
 */
export interface EventMiddleware {
  readonly name: string;
  process(context: MiddlewareContext, next: NextFn): Promise<HandlerResult>;
}

/**
 * Nest middleware around `terminal`. The first middleware in the list is the
 * outermost: it sees the call first and the result last.
 */
export function composePipeline(middlewares: readonly EventMiddleware[], terminal: NextFn): NextFn {
  return middlewares.reduceRight<NextFn>((next, middleware) => (context) => middleware.process(context, next), terminal);
}
