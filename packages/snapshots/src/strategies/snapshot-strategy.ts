import { abortReason, parseOptions, type CancelledError } from '@eventide/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

/**
 * Decides when an aggregate should be snapshotted. `eventCount` is the number
 * of events applied since the last snapshot.
 */
export interface SnapshotStrategy {
  shouldSnapshot(aggregateId: string, eventCount: number, signal?: AbortSignal): Promise<Result<boolean, CancelledError>>;
}

export const EventCountStrategyOptionsSchema = z.object({
  threshold: z.number().int().positive().default(10),
});

export class EventCountSnapshotStrategy implements SnapshotStrategy {
  readonly threshold: number;

  constructor(options: z.input<typeof EventCountStrategyOptionsSchema> = {}) {
    this.threshold = parseOptions(EventCountStrategyOptionsSchema, options, 'event count snapshot strategy').threshold;
  }

  shouldSnapshot(_aggregateId: string, eventCount: number, signal?: AbortSignal): Promise<Result<boolean, CancelledError>> {
    if (signal?.aborted) {
      return Promise.resolve(err(abortReason(signal)));
    }
    return Promise.resolve(ok(eventCount >= this.threshold));
  }
}

export const TimeBasedStrategyOptionsSchema = z.object({
  thresholdMinutes: z.number().positive().default(60),
});

export type TimeBasedStrategyOptions = z.input<typeof TimeBasedStrategyOptionsSchema> & {
  now?: (() => number) | undefined;
};

/**
 * Snapshots an aggregate the first time it is seen, then again whenever the
 * threshold has passed since the last `true` answer.
 *
 * Answering `true` records the current time for the aggregate: callers are
 * expected to take the snapshot whenever they are told to.
 */
export class TimeBasedSnapshotStrategy implements SnapshotStrategy {
  readonly thresholdMs: number;
  private readonly now: () => number;
  private readonly lastSnapshotAt = new Map<string, number>();

  constructor(options: TimeBasedStrategyOptions = {}) {
    const { now, ...rest } = options;
    this.thresholdMs = parseOptions(TimeBasedStrategyOptionsSchema, rest, 'time based snapshot strategy').thresholdMinutes * 60_000;
    this.now = now ?? Date.now;
  }

  shouldSnapshot(aggregateId: string, _eventCount: number, signal?: AbortSignal): Promise<Result<boolean, CancelledError>> {
    if (signal?.aborted) {
      return Promise.resolve(err(abortReason(signal)));
    }

    const now = this.now();
    const last = this.lastSnapshotAt.get(aggregateId);
    if (last === undefined || now - last >= this.thresholdMs) {
      this.lastSnapshotAt.set(aggregateId, now);
      return Promise.resolve(ok(true));
    }
    return Promise.resolve(ok(false));
  }

  /** Forget the recorded time, so the next check for the aggregate answers true. */
  forget(aggregateId: string): void {
    this.lastSnapshotAt.delete(aggregateId);
  }
}

/**
 * True when any child strategy says so. Children are asked in order and the
 * rest are skipped after the first `true`.
 */
export class CompositeSnapshotStrategy implements SnapshotStrategy {
  constructor(private readonly strategies: readonly SnapshotStrategy[]) {}

  async shouldSnapshot(aggregateId: string, eventCount: number, signal?: AbortSignal): Promise<Result<boolean, CancelledError>> {
    for (const strategy of this.strategies) {
      const decision = await strategy.shouldSnapshot(aggregateId, eventCount, signal);
      if (decision.isErr() || decision.value) {
        return decision;
      }
    }
    return ok(false);
  }
}
