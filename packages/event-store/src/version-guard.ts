import { ConcurrencyConflictError, type DomainEvent } from '@eventide/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

/**
 * Version check applied by every store before a write: the event must be
 * exactly one past the aggregate's current version (1 for a new aggregate).
 */
export function checkNextVersion(event: DomainEvent, currentVersion: number): Result<void, ConcurrencyConflictError> {
  const expectedVersion = currentVersion + 1;
  if (event.version !== expectedVersion) {
    return err(new ConcurrencyConflictError(event.aggregateId, expectedVersion, event.version));
  }
  return ok();
}

/**
 * Check a batch against the current versions, advancing a copy of the
 * version map as it goes so a batch may carry several events per aggregate.
 */
export function checkBatchVersions(
  events: readonly DomainEvent[],
  currentVersions: ReadonlyMap<string, number>
): Result<void, ConcurrencyConflictError> {
  const versions = new Map(currentVersions);
  for (const event of events) {
    const check = checkNextVersion(event, versions.get(event.aggregateId) ?? 0);
    if (check.isErr()) {
      return check;
    }
    versions.set(event.aggregateId, event.version);
  }
  return ok();
}
