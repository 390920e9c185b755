/**
 * Circuit Breaker Registry
 *
 * Central management for all endpoint circuit breakers.
 * Handles creation, lookup, monitoring snapshots and bulk operations.
 */

import { createChildLogger, type Logger } from '../logging';
import { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker';
import {
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
  type StateChangeListener,
  DEFAULT_CIRCUIT_CONFIG,
} from './types';

/**
 * Configuration options for CircuitBreakerRegistry
 */
export interface CircuitBreakerRegistryOptions {
  /** Default circuit breaker configuration */
  defaultConfig?: Partial<CircuitBreakerConfig>;
  /** Shared failure predicate for every breaker */
  isFailure?: CircuitBreakerOptions['isFailure'];
  logger?: Logger;
}

/**
 * Statistics about the circuit breaker registry
 */
export interface CircuitBreakerRegistryStats {
  /** Total number of circuits */
  totalCircuits: number;
  /** Count of circuits in each state */
  stateCounts: Record<CircuitState, number>;
  /** Total failures across all circuits */
  totalFailures: number;
  /** Total successes across all circuits */
  totalSuccesses: number;
  /** Total rejected calls across all circuits */
  totalRejections: number;
}

/**
 * Central registry for managing circuit breakers, one per endpoint key.
 *
 * Lookup and creation are synchronous, so two tasks asking for the same key
 * at once always share a single breaker.
 */
export class CircuitBreakerRegistry {
  private breakers: Map<string, CircuitBreaker>;
  private defaultConfig: CircuitBreakerConfig;
  private isFailure?: CircuitBreakerOptions['isFailure'];
  private log: Logger;
  private globalListeners: StateChangeListener[];

  constructor(options: CircuitBreakerRegistryOptions = {}) {
    this.breakers = new Map();
    this.defaultConfig = { ...DEFAULT_CIRCUIT_CONFIG, ...options.defaultConfig };
    this.isFailure = options.isFailure;
    this.log = options.logger ?? createChildLogger({ component: 'CircuitBreakerRegistry' });
    this.globalListeners = [];
  }

  /**
   * Get or create the circuit breaker for a key.
   * `overrides` only apply when the breaker is created.
   */
  getCircuit(name: string, overrides?: Partial<CircuitBreakerConfig>): CircuitBreaker {
    let breaker = this.breakers.get(name);

    if (!breaker) {
      breaker = new CircuitBreaker(name, {
        config: { ...this.defaultConfig, ...overrides },
        isFailure: this.isFailure,
        logger: this.log.child({ breaker: name }),
      });

      breaker.onStateChange((event) => {
        for (const listener of this.globalListeners) {
          try {
            listener(event);
          } catch (error) {
            this.log.error({ err: error, breaker: event.name }, 'Global state change listener failed');
          }
        }
      });

      this.breakers.set(name, breaker);
      this.log.info({ breaker: name }, 'Circuit breaker registered');
    }

    return breaker;
  }

  /**
   * Look up an existing breaker without creating one
   */
  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  hasCircuit(name: string): boolean {
    return this.breakers.has(name);
  }

  /**
   * Get status for a breaker, or null when none exists yet
   */
  getStatus(name: string): CircuitBreakerStatus | null {
    return this.breakers.get(name)?.status() ?? null;
  }

  listNames(): string[] {
    return Array.from(this.breakers.keys());
  }

  listCircuits(): CircuitBreaker[] {
    return Array.from(this.breakers.values());
  }

  getCircuitsByState(state: CircuitState): CircuitBreaker[] {
    return this.listCircuits().filter(b => b.state === state);
  }

  getOpenCircuits(): CircuitBreaker[] {
    return this.getCircuitsByState(CircuitState.OPEN);
  }

  /**
   * Add a listener for state changes on every breaker
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.globalListeners.push(listener);
    return () => {
      const index = this.globalListeners.indexOf(listener);
      if (index !== -1) {
        this.globalListeners.splice(index, 1);
      }
    };
  }

  /**
   * Get statistics about all circuits
   */
  getStats(): CircuitBreakerRegistryStats {
    const stateCounts: Record<CircuitState, number> = {
      [CircuitState.CLOSED]: 0,
      [CircuitState.OPEN]: 0,
      [CircuitState.HALF_OPEN]: 0,
    };

    let totalFailures = 0;
    let totalSuccesses = 0;
    let totalRejections = 0;

    for (const circuit of this.breakers.values()) {
      stateCounts[circuit.state]++;
      totalFailures += circuit.totalFailures;
      totalSuccesses += circuit.totalSuccesses;
      totalRejections += circuit.totalRejections;
    }

    return {
      totalCircuits: this.breakers.size,
      stateCounts,
      totalFailures,
      totalSuccesses,
      totalRejections,
    };
  }

  /**
   * Snapshot every breaker, for monitoring layers
   */
  statuses(): CircuitBreakerStatus[] {
    return this.listCircuits().map(b => b.status());
  }

  /**
   * Reset all circuits to CLOSED
   */
  resetAll(requestedBy?: string): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset(requestedBy);
    }
    this.log.info({ requestedBy }, 'All circuit breakers reset');
  }
}
