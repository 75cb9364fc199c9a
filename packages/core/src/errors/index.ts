/**
 * Error kinds used for retry and circuit-breaker classification. Retry and
 * breaker decisions read the kind through `classifyError` or a caller-supplied
 * classifier.
 */
export const ERROR_KINDS = [
  'handler',
  'transient',
  'timeout',
  'circuit_open',
  'concurrency_conflict',
  'persistence',
  'validation',
  'cancelled',
  'not_found',
  'unknown',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export abstract class KindedError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised by (or wrapped around a failure of) an event handler.
 */
export class HandlerError extends KindedError {
  readonly kind = 'handler' as const;

  constructor(
    message: string,
    readonly handlerName: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A failure expected to go away on its own (dropped connection, lock timeout, ...).
 */
export class TransientError extends KindedError {
  readonly kind = 'transient' as const;
}

export class TimeoutError extends KindedError {
  readonly kind = 'timeout' as const;

  constructor(
    message: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Synthetic failure returned when a circuit breaker rejects a call. The guarded
 * handler was never invoked.
 */
export class CircuitOpenError extends KindedError {
  readonly kind = 'circuit_open' as const;

  constructor(readonly circuitKey: string) {
    super(`Circuit breaker is open for ${circuitKey}`);
  }
}

/**
 * The store rejected an out-of-sequence version. Callers must re-read the
 * aggregate and recompute; this is never retried automatically.
 */
export class ConcurrencyConflictError extends KindedError {
  readonly kind = 'concurrency_conflict' as const;

  constructor(
    readonly aggregateId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number
  ) {
    super(
      `Concurrency conflict for aggregate ${aggregateId}: expected version ${expectedVersion}, got ${actualVersion}`
    );
  }
}

export class PersistenceError extends KindedError {
  readonly kind = 'persistence' as const;
}

export class ValidationError extends KindedError {
  readonly kind = 'validation' as const;
}

export class NotFoundError extends KindedError {
  readonly kind = 'not_found' as const;
}

export class CancelledError extends KindedError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Operation was cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isKindedError(error: unknown): error is KindedError {
  return error instanceof KindedError;
}

/**
 * Map any thrown or returned value to an ErrorKind.
 *
 * KindedError carries its own kind; DOM-style AbortError/TimeoutError (from
 * AbortSignal.abort() and AbortSignal.timeout()) map to cancelled/timeout.
 */
export function classifyError(error: unknown): ErrorKind {
  if (isKindedError(error)) {
    return error.kind;
  }
  if (error instanceof Error) {
    if (error.name === 'AbortError') return 'cancelled';
    if (error.name === 'TimeoutError') return 'timeout';
  }
  return 'unknown';
}
