/**
 * @webhook-relay/core - Destination Circuit
 *
 * Consecutive-failure circuit breaker for one destination, built on opossum.
 * opossum's own percentage trip is disabled; this wrapper counts
 * consecutive counted failures and opens the breaker at the threshold.
 * opossum then owns the open → half-open timer and lets a single trial
 * through while half-open.
 */

import CircuitBreaker from 'opossum';

import {
  circuitBreakerCloseCounter,
  circuitBreakerHalfOpenCounter,
  circuitBreakerOpenCounter,
} from '../metrics/index.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import type { CircuitBreakerConfig } from '../types/config.js';
import type { CircuitSnapshot, CircuitStateName, DestinationId } from '../types/index.js';

/** Signals a counted failure to opossum from inside a guarded call */
class CountedFailure extends Error {
  constructor() {
    super('counted failure');
    this.name = 'CountedFailure';
  }
}

/**
 * How an outcome moves the circuit: `success` resets the failure count,
 * `failure` adds to it, `neutral` leaves it as it is.
 */
export type OutcomeVerdict = 'success' | 'failure' | 'neutral';

export type GuardedResult<T> =
  | { ran: true; outcome: T }
  | { ran: false };

export interface DestinationCircuitOptions extends CircuitBreakerConfig {
  destinationId: DestinationId;
  logger?: StructuredLogger;
  now?: () => number;
  /** Called on every transition into open */
  onOpen?: (destinationId: DestinationId) => void;
}

type Action<T> = () => Promise<T>;

export class DestinationCircuit {
  private readonly breaker: CircuitBreaker<[Action<unknown>], unknown>;
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;

  constructor(private readonly options: DestinationCircuitOptions) {
    this.logger = options.logger ?? new NullLogger();
    this.now = options.now ?? Date.now;

    this.breaker = new CircuitBreaker(async (action: Action<unknown>) => await action(), {
      timeout: false,
      resetTimeout: options.recoveryTimeoutMs,
      errorThresholdPercentage: 100,
      volumeThreshold: Number.MAX_SAFE_INTEGER,
      name: `webhook-circuit:${options.destinationId}`,
    });

    const labels = { destination_id: options.destinationId };

    this.breaker.on('open', () => {
      this.openedAt = this.now();
      circuitBreakerOpenCounter.inc(labels);
      options.onOpen?.(options.destinationId);
      this.logger.warn('Destination circuit OPEN - dropping deliveries', {
        action: 'circuit_breaker_open',
        destinationId: options.destinationId,
        consecutiveFailures: this.consecutiveFailures,
      });
    });

    this.breaker.on('halfOpen', () => {
      circuitBreakerHalfOpenCounter.inc(labels);
      this.logger.info('Destination circuit HALF-OPEN - allowing one trial', {
        action: 'circuit_breaker_half_open',
        destinationId: options.destinationId,
      });
    });

    this.breaker.on('close', () => {
      this.consecutiveFailures = 0;
      circuitBreakerCloseCounter.inc(labels);
      this.logger.info('Destination circuit CLOSED', {
        action: 'circuit_breaker_closed',
        destinationId: options.destinationId,
      });
    });
  }

  get state(): CircuitStateName {
    if (this.breaker.opened) return 'open';
    if (this.breaker.halfOpen) return 'half-open';
    return 'closed';
  }

  /**
   * Runs `action` unless the circuit rejects it.
   *
   * `judge` decides how each outcome moves the circuit. Any exception
   * thrown by `action` is counted as a failure and propagates. A neutral
   * outcome during the half-open trial closes the circuit.
   */
  async run<T>(action: Action<T>, judge: (outcome: T) => OutcomeVerdict): Promise<GuardedResult<T>> {
    const box: { ran: boolean; settled?: { outcome: T; verdict: OutcomeVerdict } } = { ran: false };

    try {
      await this.breaker.fire(async () => {
        box.ran = true;
        const outcome = await action();
        const verdict = judge(outcome);
        box.settled = { outcome, verdict };
        if (verdict === 'failure') {
          throw new CountedFailure();
        }
      });
    } catch (error) {
      if (!box.ran) {
        return { ran: false };
      }
      this.recordFailure();
      if (!(error instanceof CountedFailure) || !box.settled) {
        throw error;
      }
      return { ran: true, outcome: box.settled.outcome };
    }

    if (!box.settled) {
      throw new Error('Guarded action finished without an outcome');
    }
    if (box.settled.verdict === 'success') {
      this.consecutiveFailures = 0;
    }
    return { ran: true, outcome: box.settled.outcome };
  }

  snapshot(): CircuitSnapshot {
    return {
      destinationId: this.options.destinationId,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      recoveryTimeoutMs: this.options.recoveryTimeoutMs,
    };
  }

  /**
   * Stops the recovery timer. The circuit rejects everything afterwards.
   */
  shutdown(): void {
    this.breaker.shutdown();
  }

  private recordFailure(): void {
    this.consecutiveFailures++;
    if (this.state === 'closed' && this.consecutiveFailures >= this.options.failureThreshold) {
      this.breaker.open();
    }
  }
}
