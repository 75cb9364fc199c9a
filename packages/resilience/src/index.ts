export {
  evaluateCanExecute,
  getCircuitStatistics,
  recordFailure,
  recordSuccess,
  resetCircuit,
  type ExecutionDecision,
} from './circuit-breaker/circuit-breaker.js';
export { CircuitBreakerRegistry, type CircuitBreakerRegistryOptions } from './circuit-breaker/registry.js';
export {
  CircuitBreakerOptionsSchema,
  createInitialCircuitState,
  type CircuitBreakerOptions,
  type CircuitBreakerThresholds,
  type CircuitState,
  type CircuitStatus,
  type CircuitTransition,
} from './circuit-breaker/types.js';
export {
  defaultRetryDelay,
  RetryOptionsSchema,
  RetryPolicy,
  type RetryDelay,
  type RetryOptions,
} from './retry/retry-policy.js';
export {
  executeWithRetry,
  type ExecuteWithRetryOptions,
  type RetryAttemptInfo,
} from './retry/execute-with-retry.js';
