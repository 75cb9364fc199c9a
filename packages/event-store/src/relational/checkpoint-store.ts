import { getErrorMessage, PersistenceError } from '@eventide/core';
import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { EventStoreDatabase } from './schema.js';

/**
 * Last processed store position per listener, so a restarted listener picks
 * up where it stopped.
 */
export interface CheckpointStore {
  load(listenerName: string): Promise<Result<number, PersistenceError>>;
  save(listenerName: string, position: number): Promise<Result<void, PersistenceError>>;
}

export class RelationalCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Kysely<EventStoreDatabase>) {}

  async load(listenerName: string): Promise<Result<number, PersistenceError>> {
    try {
      const row = await this.db
        .selectFrom('event_listener_checkpoints')
        .select('last_position')
        .where('listener_name', '=', listenerName)
        .executeTakeFirst();
      return ok(row ? Number(row.last_position) : 0);
    } catch (error) {
      return err(new PersistenceError(`Failed to load checkpoint: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  async save(listenerName: string, position: number): Promise<Result<void, PersistenceError>> {
    const updatedAt = new Date().toISOString();
    try {
      await this.db
        .insertInto('event_listener_checkpoints')
        .values({ listener_name: listenerName, last_position: position, updated_at: updatedAt })
        .onConflict((oc) =>
          oc.column('listener_name').doUpdateSet({ last_position: position, updated_at: updatedAt })
        )
        .execute();
      return ok();
    } catch (error) {
      return err(new PersistenceError(`Failed to save checkpoint: ${getErrorMessage(error)}`, { cause: error }));
    }
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly positions = new Map<string, number>();

  load(listenerName: string): Promise<Result<number, PersistenceError>> {
    return Promise.resolve(ok(this.positions.get(listenerName) ?? 0));
  }

  save(listenerName: string, position: number): Promise<Result<void, PersistenceError>> {
    this.positions.set(listenerName, position);
    return Promise.resolve(ok());
  }
}
