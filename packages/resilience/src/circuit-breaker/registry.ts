import { KeyedLock, parseOptions } from '@eventide/core';

import { evaluateCanExecute, recordFailure, recordSuccess, resetCircuit } from './circuit-breaker.js';
import {
  CircuitBreakerOptionsSchema,
  createInitialCircuitState,
  type CircuitBreakerOptions,
  type CircuitBreakerThresholds,
  type CircuitState,
  type CircuitTransition,
} from './types.js';

export interface CircuitBreakerRegistryOptions extends CircuitBreakerOptions {
  now?: (() => number) | undefined;
  onTransition?: ((transition: CircuitTransition) => void) | undefined;
}

/**
 * Stateful registry of circuit breaker state keyed by an arbitrary string
 * (event type by default). Breakers are created lazily on first use.
 *
 * Every read-modify-write, including the state change hidden in canExecute,
 * runs under a per-key lock so concurrent dispatches cannot lose updates.
 */
export class CircuitBreakerRegistry {
  private readonly states = new Map<string, CircuitState>();
  private readonly lock = new KeyedLock();
  private readonly thresholds: CircuitBreakerThresholds;
  private readonly now: () => number;
  private readonly onTransition: ((transition: CircuitTransition) => void) | undefined;

  constructor(options: CircuitBreakerRegistryOptions = {}) {
    const { now, onTransition, ...thresholds } = options;
    this.thresholds = parseOptions(CircuitBreakerOptionsSchema, thresholds, 'circuit breaker');
    this.now = now ?? Date.now;
    this.onTransition = onTransition;
  }

  canExecute(key: string): Promise<boolean> {
    return this.lock.runExclusive(key, () => {
      const decision = evaluateCanExecute(this.getOrCreate(key), this.now());
      this.commit(key, decision.state);
      return decision.allowed;
    });
  }

  recordSuccess(key: string): Promise<CircuitState> {
    return this.lock.runExclusive(key, () => this.commit(key, recordSuccess(this.getOrCreate(key))));
  }

  recordFailure(key: string): Promise<CircuitState> {
    return this.lock.runExclusive(key, () => this.commit(key, recordFailure(this.getOrCreate(key), this.now())));
  }

  get(key: string): CircuitState | undefined {
    return this.states.get(key);
  }

  has(key: string): boolean {
    return this.states.has(key);
  }

  reset(key: string): Promise<void> {
    return this.lock.runExclusive(key, () => {
      const state = this.states.get(key);
      if (state) {
        this.commit(key, resetCircuit(state));
      }
    });
  }

  entries(): IterableIterator<[string, CircuitState]> {
    return this.states.entries();
  }

  asReadonlyMap(): ReadonlyMap<string, CircuitState> {
    return this.states;
  }

  clear(): void {
    this.states.clear();
  }

  private getOrCreate(key: string): CircuitState {
    let state = this.states.get(key);
    if (!state) {
      state = createInitialCircuitState(this.thresholds);
      this.states.set(key, state);
    }
    return state;
  }

  private commit(key: string, next: CircuitState): CircuitState {
    const previous = this.getOrCreate(key);
    this.states.set(key, next);
    if (previous.status !== next.status) {
      this.onTransition?.({ key, from: previous.status, to: next.status, state: next });
    }
    return next;
  }
}
