import { classifyError, ERROR_KINDS, parseOptions, sleep, type ErrorKind } from '@eventide/core';
import { z } from 'zod';

export const RetryOptionsSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  baseDelayMs: z.number().nonnegative().default(100),
  maxDelayMs: z.number().nonnegative().default(5000),
  backoffFactor: z.number().min(1).default(2),
  /** Kinds worth retrying. Omitted means every failure except cancellation is retried. */
  retryableKinds: z.array(z.enum(ERROR_KINDS)).optional(),
});

export type RetryOptions = z.input<typeof RetryOptionsSchema> & {
  /** Map an error to a kind. Defaults to classifyError. */
  classify?: ((error: unknown) => ErrorKind) | undefined;
};

export type RetryDelay = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Retry eligibility and exponential backoff.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffFactor: number;
  readonly retryableKinds: readonly ErrorKind[] | undefined;
  private readonly classify: (error: unknown) => ErrorKind;

  constructor(options: RetryOptions = {}) {
    const { classify, ...rest } = options;
    const parsed = parseOptions(RetryOptionsSchema, rest, 'retry');
    if (parsed.maxDelayMs < parsed.baseDelayMs) {
      throw new Error(
        `Invalid retry options:\n  - maxDelayMs: must be >= baseDelayMs (${parsed.maxDelayMs} < ${parsed.baseDelayMs})`
      );
    }
    this.maxRetries = parsed.maxRetries;
    this.baseDelayMs = parsed.baseDelayMs;
    this.maxDelayMs = parsed.maxDelayMs;
    this.backoffFactor = parsed.backoffFactor;
    this.retryableKinds = parsed.retryableKinds;
    this.classify = classify ?? classifyError;
  }

  shouldRetry(error: unknown): boolean {
    const kind = this.classify(error);
    if (kind === 'cancelled') return false;
    if (!this.retryableKinds) return true;
    return this.retryableKinds.includes(kind);
  }

  /**
   * Backoff before retry number `attempt + 1` (attempt is 0-based).
   */
  getDelayMs(attempt: number): number {
    return Math.min(this.baseDelayMs * Math.pow(this.backoffFactor, attempt), this.maxDelayMs);
  }
}

export const defaultRetryDelay: RetryDelay = sleep;
