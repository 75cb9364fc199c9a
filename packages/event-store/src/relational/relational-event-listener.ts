import { getErrorMessage, toError, type DomainEvent } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { ChangeNotifier, Unlisten } from '../notifications/change-notifier.js';
import type { ReadError } from '../port.js';

import type { CheckpointStore } from './checkpoint-store.js';

const DEFAULT_BATCH_SIZE = 100;

export interface PositionedEvent {
  position: number;
  event: DomainEvent;
}

/**
 * Reads committed events in insertion order. RelationalEventStore implements it.
 */
export interface PositionedEventSource {
  getEventsAfterPosition(afterPosition: number, limit: number): Promise<Result<PositionedEvent[], ReadError>>;
}

export type PositionedEventHandler = (
  event: DomainEvent,
  position: number
) => Promise<Result<void, Error>> | Result<void, Error>;

export interface RelationalEventListenerOptions {
  /** Checkpoint key. Two listeners with the same name share progress. */
  name: string;
  source: PositionedEventSource;
  notifier: ChangeNotifier;
  checkpoints: CheckpointStore;
  handler: PositionedEventHandler;
  batchSize?: number | undefined;
  /** Also drain on a timer, for notifications lost while disconnected. */
  pollIntervalMs?: number | undefined;
  logger?: Logger | undefined;
}

/**
 * Delivers every committed event to `handler` exactly in store order, at least
 * once, resuming from the saved checkpoint after a restart.
 *
 * Notifications only wake the listener; it always re-reads rows past its
 * checkpoint, so several commits arriving together collapse into one drain.
 * A handler failure stops the current drain at that event, and the event is
 * offered again on the next wake-up.
 */
export class RelationalEventListener {
  private readonly options: Readonly<RelationalEventListenerOptions>;
  private readonly batchSize: number;
  private readonly logger: Logger;

  private position = 0;
  private running = false;
  private pending = false;
  private draining: Promise<void> | undefined;
  private unlisten: Unlisten | undefined;
  private pollTimer: NodeJS.Timeout | undefined;

  constructor(options: RelationalEventListenerOptions) {
    this.options = options;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(this.batchSize) || this.batchSize <= 0) {
      throw new Error(`Listener batch size must be a positive integer, got ${this.batchSize}`);
    }
    this.logger = options.logger ?? getLogger(`RelationalEventListener:${options.name}`);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Last position handled successfully. */
  get checkpoint(): number {
    return this.position;
  }

  async start(): Promise<Result<void, Error>> {
    if (this.running) {
      return ok();
    }

    const saved = await this.options.checkpoints.load(this.options.name);
    if (saved.isErr()) {
      return err(saved.error);
    }
    this.position = saved.value;

    const listening = await this.options.notifier.listen(() => this.requestDrain());
    if (listening.isErr()) {
      return err(listening.error);
    }
    this.unlisten = listening.value;
    this.running = true;

    if (this.options.pollIntervalMs !== undefined) {
      this.pollTimer = setInterval(() => this.requestDrain(), this.options.pollIntervalMs);
      this.pollTimer.unref();
    }

    this.logger.info({ position: this.position }, 'Event listener started');
    // Catch up on anything committed while the listener was down
    this.requestDrain();
    return ok();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.pending = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
    await this.unlisten?.();
    this.unlisten = undefined;
    await this.draining;
    this.logger.info({ position: this.position }, 'Event listener stopped');
  }

  /** Schedule a drain; coalesces with one already in progress. */
  requestDrain(): void {
    if (!this.running) return;
    if (this.draining) {
      this.pending = true;
      return;
    }
    this.draining = this.drainUntilSettled().finally(() => {
      this.draining = undefined;
    });
  }

  /** Resolves once no drain is in progress. */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private async drainUntilSettled(): Promise<void> {
    do {
      this.pending = false;
      await this.drainOnce();
    } while (this.pending && this.running);
  }

  private async drainOnce(): Promise<void> {
    while (this.running) {
      const batch = await this.options.source.getEventsAfterPosition(this.position, this.batchSize);
      if (batch.isErr()) {
        this.logger.error({ error: batch.error, position: this.position }, 'Failed to read events for listener');
        return;
      }

      for (const { position, event } of batch.value) {
        if (!this.running) return;

        const handled = await this.invokeHandler(event, position);
        if (handled.isErr()) {
          this.logger.error(
            { error: handled.error, eventId: event.eventId, eventType: event.eventType, position },
            'Listener handler failed; will retry on next wake-up'
          );
          return;
        }

        this.position = position;
        const saved = await this.options.checkpoints.save(this.options.name, position);
        if (saved.isErr()) {
          this.logger.warn({ error: saved.error, position }, 'Failed to save listener checkpoint');
        }
      }

      if (batch.value.length < this.batchSize) return;
    }
  }

  private async invokeHandler(event: DomainEvent, position: number): Promise<Result<void, Error>> {
    try {
      return await this.options.handler(event, position);
    } catch (error) {
      return err(new Error(`Listener handler threw: ${getErrorMessage(error)}`, { cause: toError(error) }));
    }
  }
}
