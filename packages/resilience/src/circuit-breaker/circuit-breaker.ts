// Pure circuit breaker functions
// All functions take a state and return a new state; the registry owns mutation.

import type { CircuitState } from './types.js';

export interface ExecutionDecision {
  allowed: boolean;
  state: CircuitState;
}

/**
 * Decide whether a call may proceed.
 *
 * This is not a pure read: an OPEN circuit whose recovery timeout has elapsed
 * moves to HALF_OPEN (success count reset) and admits the call. Callers must
 * follow every `allowed: true` with exactly one recordSuccess/recordFailure.
 */
export const evaluateCanExecute = (state: CircuitState, now: number): ExecutionDecision => {
  switch (state.status) {
    case 'closed':
    case 'half-open':
      return { allowed: true, state };
    case 'open':
      if (now - state.openedAt >= state.recoveryTimeoutMs) {
        return { allowed: true, state: { ...state, status: 'half-open', successCount: 0 } };
      }
      return { allowed: false, state };
  }
};

/**
 * Record a successful call and return new state
 */
export const recordSuccess = (state: CircuitState): CircuitState => {
  switch (state.status) {
    case 'closed':
      return state.failureCount === 0 ? state : { ...state, failureCount: 0 };
    case 'half-open': {
      const successCount = state.successCount + 1;
      if (successCount >= state.successThreshold) {
        return { ...state, status: 'closed', failureCount: 0, successCount: 0 };
      }
      return { ...state, successCount };
    }
    case 'open':
      // A call admitted just before the circuit opened; the trip stands
      return state;
  }
};

/**
 * Record a failed call and return new state
 */
export const recordFailure = (state: CircuitState, now: number): CircuitState => {
  switch (state.status) {
    case 'closed': {
      const failureCount = state.failureCount + 1;
      if (failureCount >= state.failureThreshold) {
        return { ...state, status: 'open', failureCount, openedAt: now };
      }
      return { ...state, failureCount };
    }
    case 'half-open':
      return { ...state, status: 'open', successCount: 0, openedAt: now };
    case 'open':
      return { ...state, failureCount: state.failureCount + 1 };
  }
};

/**
 * Reset circuit breaker to initial state
 */
export const resetCircuit = (state: CircuitState): CircuitState => ({
  ...state,
  status: 'closed',
  failureCount: 0,
  successCount: 0,
  openedAt: 0,
});

export const getCircuitStatistics = (state: CircuitState, now: number) => {
  const timeUntilRecoveryMs =
    state.status === 'open' ? Math.max(0, state.recoveryTimeoutMs - (now - state.openedAt)) : 0;

  return {
    status: state.status,
    failureCount: state.failureCount,
    successCount: state.successCount,
    openedAt: state.openedAt,
    failureThreshold: state.failureThreshold,
    successThreshold: state.successThreshold,
    recoveryTimeoutMs: state.recoveryTimeoutMs,
    timeUntilRecoveryMs,
  };
};
