import { CancelledError, HandlerError, TransientError } from '@eventide/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { executeWithRetry } from '../execute-with-retry.js';
import { RetryPolicy } from '../retry-policy.js';

describe('RetryPolicy', () => {
  it('should use the documented defaults', () => {
    const policy = new RetryPolicy();

    expect(policy.maxRetries).toBe(3);
    expect(policy.baseDelayMs).toBe(100);
    expect(policy.maxDelayMs).toBe(5000);
    expect(policy.backoffFactor).toBe(2);
  });

  it('should grow the delay exponentially up to the cap', () => {
    const policy = new RetryPolicy({ baseDelayMs: 100, backoffFactor: 2, maxDelayMs: 5000 });

    expect(Array.from({ length: 8 }, (_, attempt) => policy.getDelayMs(attempt))).toEqual([
      100, 200, 400, 800, 1600, 3200, 5000, 5000,
    ]);
  });

  it('should keep fractional delays', () => {
    const policy = new RetryPolicy({ baseDelayMs: 100, backoffFactor: 1.5, maxDelayMs: 1000 });

    expect(policy.getDelayMs(1)).toBe(150);
    expect(policy.getDelayMs(2)).toBe(225);
    expect(policy.getDelayMs(3)).toBe(337.5);
    expect(policy.getDelayMs(6)).toBe(1000);
  });

  it('should retry everything but cancellation when no allow-list is set', () => {
    const policy = new RetryPolicy();

    expect(policy.shouldRetry(new Error('anything'))).toBe(true);
    expect(policy.shouldRetry(new HandlerError('bad', 'h'))).toBe(true);
    expect(policy.shouldRetry(new CancelledError())).toBe(false);
  });

  it('should only retry allow-listed kinds', () => {
    const policy = new RetryPolicy({ retryableKinds: ['transient', 'timeout'] });

    expect(policy.shouldRetry(new TransientError('reset'))).toBe(true);
    expect(policy.shouldRetry(new HandlerError('bad', 'h'))).toBe(false);
    expect(policy.shouldRetry(new Error('plain'))).toBe(false);
  });

  it('should honour a custom classifier', () => {
    const policy = new RetryPolicy({
      retryableKinds: ['transient'],
      classify: (error) => (error instanceof Error && error.message.includes('ECONNRESET') ? 'transient' : 'unknown'),
    });

    expect(policy.shouldRetry(new Error('read ECONNRESET'))).toBe(true);
    expect(policy.shouldRetry(new Error('syntax error'))).toBe(false);
  });

  it('should reject a cap below the base delay', () => {
    expect(() => new RetryPolicy({ baseDelayMs: 500, maxDelayMs: 100 })).toThrow(/maxDelayMs/);
  });
});

describe('executeWithRetry', () => {
  it('should stop after maxRetries + 1 attempts without sleeping after the last', async () => {
    const policy = new RetryPolicy({ maxRetries: 3 });
    const delay = vi.fn(() => Promise.resolve());
    const operation = vi.fn(() => Promise.resolve(err(new TransientError('still down'))));

    const result = await executeWithRetry(operation, { policy, delay });

    expect(result.isErr()).toBe(true);
    expect(operation).toHaveBeenCalledTimes(4);
    expect(delay.mock.calls.map((call: unknown[]) => call[0])).toEqual([100, 200, 400]);
  });

  it('should return the first success', async () => {
    const policy = new RetryPolicy();
    const delay = vi.fn(() => Promise.resolve());
    let calls = 0;

    const result = await executeWithRetry(
      (): Promise<Result<string, Error>> => {
        calls++;
        return Promise.resolve(calls < 3 ? err(new TransientError('flaky')) : ok('done'));
      },
      { policy, delay }
    );

    expect(result._unsafeUnwrap()).toBe('done');
    expect(calls).toBe(3);
    expect(delay).toHaveBeenCalledTimes(2);
  });

  it('should return non-retryable failures immediately', async () => {
    const policy = new RetryPolicy({ retryableKinds: ['transient'] });
    const delay = vi.fn(() => Promise.resolve());
    const failure = new HandlerError('validation failed', 'h');

    const result = await executeWithRetry(() => Promise.resolve(err(failure)), { policy, delay });

    expect(result._unsafeUnwrapErr()).toBe(failure);
    expect(delay).not.toHaveBeenCalled();
  });

  it('should abort a pending backoff when cancelled', async () => {
    const policy = new RetryPolicy({ baseDelayMs: 60_000, maxDelayMs: 60_000 });
    const controller = new AbortController();
    const operation = vi.fn(() => Promise.resolve(err(new TransientError('down'))));

    const pending = executeWithRetry(operation, {
      policy,
      signal: controller.signal,
      onRetry: () => controller.abort(),
    });

    const result = await pending;
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should report each retry', async () => {
    const policy = new RetryPolicy({ maxRetries: 2 });
    const onRetry = vi.fn();

    await executeWithRetry(() => Promise.resolve(err(new TransientError('down'))), {
      policy,
      delay: () => Promise.resolve(),
      onRetry,
    });

    expect(onRetry.mock.calls.map((call: unknown[]) => call[0])).toMatchObject([
      { attempt: 0, delayMs: 100 },
      { attempt: 1, delayMs: 200 },
    ]);
  });
});
