import { z } from 'zod';

/**
 * Circuit breaker states
 */
export type CircuitStatus = 'closed' | 'open' | 'half-open';

export const CircuitBreakerOptionsSchema = z.object({
  failureThreshold: z.number().int().positive().default(5),
  recoveryTimeoutMs: z.number().int().nonnegative().default(30_000),
  successThreshold: z.number().int().positive().default(2),
});

export type CircuitBreakerOptions = z.input<typeof CircuitBreakerOptionsSchema>;
export type CircuitBreakerThresholds = z.output<typeof CircuitBreakerOptionsSchema>;

/**
 * Circuit breaker state (immutable). Transitions return a new state.
 */
export interface CircuitState extends CircuitBreakerThresholds {
  status: CircuitStatus;
  failureCount: number;
  successCount: number;
  /** Epoch millis of the last transition into OPEN; 0 if never opened. */
  openedAt: number;
}

export const createInitialCircuitState = (thresholds: CircuitBreakerThresholds): CircuitState => ({
  ...thresholds,
  status: 'closed',
  failureCount: 0,
  successCount: 0,
  openedAt: 0,
});

export interface CircuitTransition {
  key: string;
  from: CircuitStatus;
  to: CircuitStatus;
  state: CircuitState;
}
