import { anySignal, parseOptions, TimeoutError } from '@eventide/core';
import { err } from 'neverthrow';
import { z } from 'zod';

import type { HandlerResult } from '../handlers/event-handler.js';

import type { EventMiddleware, MiddlewareContext, NextFn } from './pipeline.js';

const TimeoutOptionsSchema = z.object({
  timeoutMs: z.number().int().positive(),
});

export type TimeoutMiddlewareOptions = z.input<typeof TimeoutOptionsSchema>;

/**
 * Fails a call with TimeoutError once it runs longer than `timeoutMs`. The
 * signal passed downstream aborts at the same moment, so handlers that honour
 * it stop their work too.
 */
export class TimeoutMiddleware implements EventMiddleware {
  readonly name = 'timeout';
  readonly timeoutMs: number;

  constructor(options: TimeoutMiddlewareOptions) {
    this.timeoutMs = parseOptions(TimeoutOptionsSchema, options, 'timeout').timeoutMs;
  }

  async process(context: MiddlewareContext, next: NextFn): Promise<HandlerResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<HandlerResult>((resolve) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(
          `Handler ${context.handlerName} timed out after ${this.timeoutMs}ms handling ${context.event.eventType}`,
          this.timeoutMs
        );
        controller.abort(error);
        resolve(err(error));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([next({ ...context, signal: anySignal(context.signal, controller.signal) }), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
