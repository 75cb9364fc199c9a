import { isObject } from '@eventide/core';

const UNIQUE_VIOLATION_CODES = new Set([
  // better-sqlite3
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  // pg (unique_violation)
  '23505',
]);

/**
 * True when a driver error reports a unique or primary key violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  return isObject(error) && typeof error['code'] === 'string' && UNIQUE_VIOLATION_CODES.has(error['code']);
}
