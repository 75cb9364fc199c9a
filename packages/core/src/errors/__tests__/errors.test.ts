import { describe, expect, it } from 'vitest';

import {
  CancelledError,
  CircuitOpenError,
  classifyError,
  ConcurrencyConflictError,
  HandlerError,
  PersistenceError,
  TransientError,
} from '../index.js';

describe('classifyError', () => {
  it('should read the kind carried by kinded errors', () => {
    expect(classifyError(new TransientError('connection reset'))).toBe('transient');
    expect(classifyError(new HandlerError('bad input', 'projector'))).toBe('handler');
    expect(classifyError(new CircuitOpenError('OrderPlaced'))).toBe('circuit_open');
    expect(classifyError(new PersistenceError('disk full'))).toBe('persistence');
    expect(classifyError(new CancelledError())).toBe('cancelled');
  });

  it('should map abort and timeout DOM exceptions', () => {
    expect(classifyError(new DOMException('aborted', 'AbortError'))).toBe('cancelled');
    expect(classifyError(new DOMException('timed out', 'TimeoutError'))).toBe('timeout');
  });

  it('should fall back to unknown', () => {
    expect(classifyError(new Error('plain'))).toBe('unknown');
    expect(classifyError('a string')).toBe('unknown');
  });
});

describe('KindedError', () => {
  it('should name errors after their class', () => {
    const error = new ConcurrencyConflictError('order-1', 4, 5);

    expect(error.name).toBe('ConcurrencyConflictError');
    expect(error.message).toBe('Concurrency conflict for aggregate order-1: expected version 4, got 5');
    expect(error.expectedVersion).toBe(4);
    expect(error.actualVersion).toBe(5);
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    expect(new TransientError('fetch failed', { cause }).cause).toBe(cause);
  });
});
