/**
 * Provider health tracking.
 *
 * One circuit per provider: CLOSED (normal) → OPEN (deprioritised) →
 * HALF-OPEN (next attempt is a probe) → CLOSED. An OPEN provider is
 * still attempted, only later in the chain.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'node:events';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF-OPEN';

export interface CircuitOptions {
  /** Consecutive retryable failures before tripping to OPEN (default: 5) */
  failureThreshold?: number;
  /** Ms to wait in OPEN before moving to HALF-OPEN (default: 30000) */
  resetTimeoutMs?: number;
}

export interface StateChange {
  providerId: string;
  from: CircuitState;
  to: CircuitState;
}

export interface ProviderHealthSnapshot {
  providerId: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalFailures: number;
  totalSuccesses: number;
}

class ProviderCircuit {
  state: CircuitState = 'CLOSED';
  consecutiveFailures = 0;
  totalFailures = 0;
  totalSuccesses = 0;
  openedAt = 0;
}

export class ProviderHealth extends EventEmitter {
  private readonly circuits = new Map<string, ProviderCircuit>();
  readonly failureThreshold: number;
  readonly resetTimeoutMs: number;

  constructor(opts: CircuitOptions = {}) {
    super();
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
  }

  getState(providerId: string): CircuitState {
    const circuit = this.circuits.get(providerId);
    if (!circuit) return 'CLOSED';
    // OPEN → HALF-OPEN once the reset timeout has elapsed
    if (circuit.state === 'OPEN' && Date.now() - circuit.openedAt >= this.resetTimeoutMs) {
      this.transition(providerId, circuit, 'HALF-OPEN');
    }
    return circuit.state;
  }

  /** True when the provider should keep its place in the chain. */
  isHealthy(providerId: string): boolean {
    return this.getState(providerId) !== 'OPEN';
  }

  recordSuccess(providerId: string): void {
    const circuit = this.circuit(providerId);
    circuit.totalSuccesses++;
    circuit.consecutiveFailures = 0;
    if (circuit.state !== 'CLOSED') {
      this.transition(providerId, circuit, 'CLOSED');
    }
  }

  recordFailure(providerId: string): void {
    const circuit = this.circuit(providerId);
    circuit.totalFailures++;
    circuit.consecutiveFailures++;

    const state = this.getState(providerId);
    if (state === 'HALF-OPEN') {
      // Probe failed
      this.transition(providerId, circuit, 'OPEN');
    } else if (state === 'CLOSED' && circuit.consecutiveFailures >= this.failureThreshold) {
      this.transition(providerId, circuit, 'OPEN');
    }
  }

  /**
   * Stable reorder: healthy providers first in their original order,
   * then OPEN ones in their original order.
   */
  order<T extends { providerId: string }>(chain: readonly T[]): T[] {
    const healthy: T[] = [];
    const open: T[] = [];
    for (const target of chain) {
      (this.isHealthy(target.providerId) ? healthy : open).push(target);
    }
    return [...healthy, ...open];
  }

  snapshot(): ProviderHealthSnapshot[] {
    return [...this.circuits.keys()].sort().map((providerId) => {
      const state = this.getState(providerId);
      const circuit = this.circuit(providerId);
      return {
        providerId,
        state,
        consecutiveFailures: circuit.consecutiveFailures,
        totalFailures: circuit.totalFailures,
        totalSuccesses: circuit.totalSuccesses,
      };
    });
  }

  /** Force every circuit back to CLOSED. */
  reset(): void {
    for (const [providerId, circuit] of this.circuits) {
      circuit.consecutiveFailures = 0;
      this.transition(providerId, circuit, 'CLOSED');
    }
  }

  private circuit(providerId: string): ProviderCircuit {
    let circuit = this.circuits.get(providerId);
    if (!circuit) {
      circuit = new ProviderCircuit();
      this.circuits.set(providerId, circuit);
    }
    return circuit;
  }

  private transition(providerId: string, circuit: ProviderCircuit, next: CircuitState): void {
    const prev = circuit.state;
    if (prev === next) return;
    circuit.state = next;
    if (next === 'OPEN') circuit.openedAt = Date.now();
    if (next === 'CLOSED') circuit.consecutiveFailures = 0;

    const change: StateChange = { providerId, from: prev, to: next };
    this.emit('stateChange', change);
  }
}
