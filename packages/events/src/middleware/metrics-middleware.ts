import { parseOptions } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import { z } from 'zod';

import type { HandlerResult } from '../handlers/event-handler.js';

import type { EventMiddleware, MiddlewareContext, NextFn } from './pipeline.js';

export const MetricsOptionsSchema = z.object({
  reportIntervalMs: z.number().int().positive().default(60_000),
});

export type MetricsMiddlewareOptions = z.input<typeof MetricsOptionsSchema> & {
  /** Metrics bucket for a call. Defaults to the event type. */
  keyOf?: ((context: MiddlewareContext) => string) | undefined;
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
};

export interface HandlerMetrics {
  count: number;
  successCount: number;
  failureCount: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

export interface HandlerMetricsSummary extends HandlerMetrics {
  averageDurationMs: number;
  /** Between 0 and 1. */
  successRate: number;
}

/**
 * Counts calls and durations per key and periodically writes a summary to the
 * log. Observes only: the result of `next` is returned untouched.
 *
 * Updates happen synchronously after `next` settles, so concurrent dispatches
 * cannot interleave inside one update.
 */
export class MetricsMiddleware implements EventMiddleware {
  readonly name = 'metrics';
  readonly reportIntervalMs: number;
  private readonly metrics = new Map<string, HandlerMetrics>();
  private readonly keyOf: (context: MiddlewareContext) => string;
  private readonly now: () => number;
  private readonly logger: Logger;
  private lastReportAt: number;

  constructor(options: MetricsMiddlewareOptions = {}) {
    const { keyOf, now, logger, ...rest } = options;
    this.reportIntervalMs = parseOptions(MetricsOptionsSchema, rest, 'metrics').reportIntervalMs;
    this.keyOf = keyOf ?? ((context) => context.event.eventType);
    this.now = now ?? Date.now;
    this.logger = logger ?? getLogger('MetricsMiddleware');
    this.lastReportAt = this.now();
  }

  async process(context: MiddlewareContext, next: NextFn): Promise<HandlerResult> {
    const key = this.keyOf(context);
    const startedAt = this.now();

    let result: HandlerResult;
    try {
      result = await next(context);
    } catch (error) {
      this.record(key, this.now() - startedAt, false);
      throw error;
    }

    this.record(key, this.now() - startedAt, result.isOk());
    if (this.now() - this.lastReportAt >= this.reportIntervalMs) {
      this.report();
    }
    return result;
  }

  getMetrics(): Record<string, HandlerMetricsSummary> {
    const summary: Record<string, HandlerMetricsSummary> = {};
    for (const [key, metrics] of this.metrics) {
      summary[key] = summarize(metrics);
    }
    return summary;
  }

  /** Log the current summary now and restart the report interval. */
  report(): Record<string, HandlerMetricsSummary> {
    const metrics = this.getMetrics();
    this.lastReportAt = this.now();
    if (Object.keys(metrics).length > 0) {
      this.logger.info({ metrics }, 'Event handler metrics');
    }
    return metrics;
  }

  reset(): void {
    this.metrics.clear();
    this.lastReportAt = this.now();
  }

  private record(key: string, durationMs: number, succeeded: boolean): void {
    const current = this.metrics.get(key);
    if (!current) {
      this.metrics.set(key, {
        count: 1,
        successCount: succeeded ? 1 : 0,
        failureCount: succeeded ? 0 : 1,
        totalDurationMs: durationMs,
        minDurationMs: durationMs,
        maxDurationMs: durationMs,
      });
      return;
    }
    current.count += 1;
    current.successCount += succeeded ? 1 : 0;
    current.failureCount += succeeded ? 0 : 1;
    current.totalDurationMs += durationMs;
    current.minDurationMs = Math.min(current.minDurationMs, durationMs);
    current.maxDurationMs = Math.max(current.maxDurationMs, durationMs);
  }
}

function summarize(metrics: HandlerMetrics): HandlerMetricsSummary {
  return {
    ...metrics,
    averageDurationMs: metrics.count === 0 ? 0 : metrics.totalDurationMs / metrics.count,
    successRate: metrics.count === 0 ? 0 : metrics.successCount / metrics.count,
  };
}
