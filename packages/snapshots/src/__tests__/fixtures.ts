import { ValidationError } from '@eventide/core';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import type { SnapshotFactory, Snapshottable } from '../types.js';

const CounterStateSchema = z.object({ total: z.number() });

export class Counter implements Snapshottable {
  readonly aggregateType = 'Counter';

  constructor(
    readonly id: string,
    readonly version: number,
    readonly total: number
  ) {}

  toSnapshot(): unknown {
    return { total: this.total };
  }
}

export const counterFactory: SnapshotFactory<Counter> = {
  aggregateType: 'Counter',
  fromSnapshot(record) {
    const state = CounterStateSchema.safeParse(record.state);
    if (!state.success) {
      return err(new ValidationError(`Invalid counter snapshot: ${state.error.message}`));
    }
    return ok(new Counter(record.aggregateId, record.version, state.data.total));
  },
};

export class Ledger implements Snapshottable {
  readonly aggregateType = 'Ledger';

  constructor(
    readonly id: string,
    readonly version: number
  ) {}

  toSnapshot(): unknown {
    return { entries: [] };
  }
}

export const ledgerFactory: SnapshotFactory<Ledger> = {
  aggregateType: 'Ledger',
  fromSnapshot: (record) => ok(new Ledger(record.aggregateId, record.version)),
};
