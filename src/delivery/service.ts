/**
 * @webhook-relay/core - Delivery Service
 *
 * Runs delivery jobs against destination webhooks.
 *
 * Job states: pending → delivered | failed-permanent | dropped-circuit-open,
 * with pending → pending on a retryable failure (attempt + 1).
 *
 * - Worker pool: a Semaphore of `maxConcurrency` slots. A job waiting out a
 *   backoff holds no slot.
 * - Admission: at most `queueSize` jobs are admitted (running or waiting);
 *   beyond that, jobs are dropped as backpressure.
 * - Ordering: attempts for one destination start in submission order, but
 *   retries mean the final delivered order is not guaranteed.
 */

import { randomUUID } from 'crypto';

import { E_CANCELED, Semaphore } from 'async-mutex';

import { err, ok, type Result } from '../errors/result.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import { deliveryLatencyHistogram } from '../metrics/index.js';
import { abortableSleep } from '../rate-limit/sleep.js';
import { DestinationRateLimiter } from '../rate-limit/rate-limiter.js';
import type { StatsAggregator } from '../stats/aggregator.js';
import type { CircuitBreakerConfig, DeliveryConfig } from '../types/config.js';
import type {
  CircuitSnapshot,
  DeliveryJob,
  DestinationConfig,
  DestinationId,
  OutboundPayload,
  RelayPayload,
} from '../types/index.js';
import { computeBackoff } from './backoff.js';
import { DestinationCircuit } from './circuit.js';
import {
  classifyStatus,
  breakerVerdict,
  classifyTransportError,
  type AttemptClass,
} from './classify.js';
import type { WebhookClient } from './webhook-client.js';

export type DeliveryErrorKind =
  | 'failed-permanent'
  | 'dropped-circuit-open'
  | 'dropped-backpressure'
  | 'destination-not-found'
  | 'shutdown';

export interface DeliveryOutcome {
  jobId: string;
  destinationId: DestinationId;
  attempts: number;
  status: number;
}

export interface DeliveryFailure {
  kind: DeliveryErrorKind;
  jobId: string;
  destinationId: DestinationId;
  attempts: number;
  reason: string;
  /** Last HTTP status seen, null when none */
  status: number | null;
}

export type DeliveryResult = Result<DeliveryOutcome, DeliveryFailure>;

export type SubmitReceipt =
  | { accepted: true; jobId: string }
  | { accepted: false; jobId: string; reason: 'dropped-backpressure' | 'shutdown' };

export interface DeliveryServiceOptions {
  client: WebhookClient;
  config: DeliveryConfig;
  circuitBreaker: CircuitBreakerConfig;
  /** Looks destinations up for deliver(id, payload) */
  resolveDestination: (destinationId: DestinationId) => Readonly<DestinationConfig> | undefined;
  stats?: StatsAggregator;
  logger?: StructuredLogger;
  rateLimiter?: DestinationRateLimiter;
  /** Random source for jitter */
  random?: () => number;
  now?: () => number;
}

export interface DeliveryServiceStatus {
  accepting: boolean;
  admitted: number;
  queueSize: number;
  maxConcurrency: number;
  circuits: number;
}

class ShutdownSignal extends Error {
  constructor() {
    super('delivery service shutting down');
    this.name = 'ShutdownSignal';
  }
}

export class DeliveryService {
  private readonly client: WebhookClient;
  private readonly config: DeliveryConfig;
  private readonly breakerConfig: CircuitBreakerConfig;
  private readonly resolveDestination: DeliveryServiceOptions['resolveDestination'];
  private readonly stats?: StatsAggregator;
  private readonly logger: StructuredLogger;
  private readonly rateLimiter: DestinationRateLimiter;
  private readonly random: () => number;
  private readonly now: () => number;

  private readonly pool: Semaphore;
  private readonly circuits = new Map<DestinationId, DestinationCircuit>();
  private readonly inFlight = new Set<Promise<DeliveryResult>>();
  private readonly cancel = new AbortController();
  private admitted = 0;
  private accepting = true;

  constructor(options: DeliveryServiceOptions) {
    this.client = options.client;
    this.config = options.config;
    this.breakerConfig = options.circuitBreaker;
    this.resolveDestination = options.resolveDestination;
    this.stats = options.stats;
    this.logger = options.logger ?? new NullLogger();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.rateLimiter =
      options.rateLimiter ??
      new DestinationRateLimiter({
        requestsPerWindow: options.config.requestsPerWindow,
        windowMs: options.config.rateWindowMs,
        enabled: true,
      });
    this.pool = new Semaphore(options.config.maxConcurrency);
  }

  /**
   * Enqueues a job and returns without waiting for it.
   */
  submit(destination: Readonly<DestinationConfig>, payload: RelayPayload): SubmitReceipt {
    const job = this.createJob(destination, payload);
    const refusal = this.admit(job);
    if (refusal) {
      return { accepted: false, jobId: job.id, reason: refusal };
    }

    const running = this.execute(destination, job);
    this.track(running);
    return { accepted: true, jobId: job.id };
  }

  /**
   * Runs one job to its terminal state.
   */
  async deliver(destinationId: DestinationId, payload: RelayPayload): Promise<DeliveryResult> {
    const destination = this.resolveDestination(destinationId);
    if (!destination) {
      return err({
        kind: 'destination-not-found',
        jobId: '',
        destinationId,
        attempts: 0,
        reason: `Destination not found: ${destinationId}`,
        status: null,
      });
    }

    const job = this.createJob(destination, payload);
    const refusal = this.admit(job);
    if (refusal) {
      return err(this.failure(job, refusal, refusal === 'shutdown' ? 'shutting down' : 'queue full', null));
    }

    const running = this.execute(destination, job);
    this.track(running);
    return await running;
  }

  getCircuitSnapshot(destinationId: DestinationId): CircuitSnapshot {
    const circuit = this.circuits.get(destinationId);
    if (circuit) return circuit.snapshot();
    return {
      destinationId,
      state: 'closed',
      consecutiveFailures: 0,
      openedAt: null,
      recoveryTimeoutMs: this.breakerConfig.recoveryTimeoutMs,
    };
  }

  listCircuits(): CircuitSnapshot[] {
    return Array.from(this.circuits.values())
      .map((circuit) => circuit.snapshot())
      .sort((a, b) => a.destinationId.localeCompare(b.destinationId));
  }

  /**
   * Drops the circuit and pacing state of a deleted destination.
   */
  forgetDestination(destinationId: DestinationId): void {
    this.circuits.get(destinationId)?.shutdown();
    this.circuits.delete(destinationId);
    this.rateLimiter.reset(destinationId);
  }

  getStatus(): DeliveryServiceStatus {
    return {
      accepting: this.accepting,
      admitted: this.admitted,
      queueSize: this.config.queueSize,
      maxConcurrency: this.config.maxConcurrency,
      circuits: this.circuits.size,
    };
  }

  /**
   * Stops accepting jobs and waits up to `graceMs` for admitted jobs.
   * Jobs still waiting afterwards are cancelled and end failed-permanent
   * with reason `shutdown`.
   */
  async shutdown(graceMs = 5000): Promise<void> {
    this.accepting = false;

    if (this.inFlight.size > 0) {
      const drained = await this.waitForDrain(graceMs);
      if (!drained) {
        this.logger.warn('Delivery grace period elapsed, cancelling pending jobs', {
          action: 'delivery_shutdown_cancel',
          pending: this.inFlight.size,
        });
        this.cancel.abort();
        this.pool.cancel();
        await Promise.allSettled(Array.from(this.inFlight));
      }
    }

    for (const circuit of this.circuits.values()) {
      circuit.shutdown();
    }
    this.rateLimiter.clear();
    this.logger.info('Delivery service stopped', { action: 'delivery_shutdown' });
  }

  private createJob(destination: Readonly<DestinationConfig>, payload: RelayPayload): DeliveryJob {
    const outbound: OutboundPayload = { ...payload };
    if (destination.username) outbound.username = destination.username;
    if (destination.avatarUrl) outbound.avatarUrl = destination.avatarUrl;

    const now = this.now();
    return {
      id: randomUUID(),
      destinationId: destination.id,
      payload: outbound,
      attempt: 0,
      nextEligibleAt: now,
      state: 'pending',
      createdAt: now,
    };
  }

  /**
   * @returns the refusal reason, or null when the job was admitted
   */
  private admit(job: DeliveryJob): 'dropped-backpressure' | 'shutdown' | null {
    if (!this.accepting) {
      return 'shutdown';
    }
    if (this.admitted >= this.config.queueSize) {
      this.stats?.recordBackpressureDrop(job.destinationId);
      this.logger.warn('Delivery queue full, dropping job', {
        action: 'backpressure_drop',
        destinationId: job.destinationId,
        jobId: job.id,
        queueSize: this.config.queueSize,
      });
      return 'dropped-backpressure';
    }
    this.admitted++;
    return null;
  }

  private track(running: Promise<DeliveryResult>): void {
    this.inFlight.add(running);
    running
      .finally(() => {
        this.inFlight.delete(running);
      })
      .catch((error: unknown) => {
        this.logger.error('Delivery job crashed', error, { action: 'delivery_job_crashed' });
      });
  }

  private async execute(
    destination: Readonly<DestinationConfig>,
    job: DeliveryJob,
  ): Promise<DeliveryResult> {
    try {
      return await this.runJob(destination, job);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      job.state = 'failed-permanent';
      this.stats?.recordDeliveryFailure(job.destinationId);
      this.logger.error('Delivery job failed unexpectedly', error, {
        action: 'delivery_failed',
        destinationId: job.destinationId,
        jobId: job.id,
      });
      return err(this.failure(job, 'failed-permanent', reason, null));
    } finally {
      this.admitted--;
    }
  }

  private async runJob(
    destination: Readonly<DestinationConfig>,
    job: DeliveryJob,
  ): Promise<DeliveryResult> {
    const media = job.payload.media;
    if (media && media.bytes.length > destination.maxMediaBytes) {
      return this.failPermanently(
        job,
        `Attachment of ${String(media.bytes.length)} bytes exceeds limit of ${String(destination.maxMediaBytes)}`,
        null,
      );
    }

    let lastStatus: number | null = null;

    while (job.attempt < this.config.maxAttempts) {
      job.attempt++;

      let outcome: AttemptClass;
      try {
        const guarded = await this.attempt(destination, job);
        if (!guarded) {
          return this.dropCircuitOpen(job);
        }
        outcome = guarded;
      } catch (error) {
        if (error === E_CANCELED || error instanceof ShutdownSignal || this.cancel.signal.aborted) {
          return this.failPermanently(job, 'shutdown', lastStatus);
        }
        throw error;
      }

      lastStatus = outcome.status;
      if (this.cancel.signal.aborted && outcome.kind !== 'delivered') {
        return this.failPermanently(job, 'shutdown', lastStatus);
      }

      switch (outcome.kind) {
        case 'delivered':
          job.state = 'delivered';
          this.stats?.recordReplicated(job.destinationId);
          this.logger.debug('Webhook delivered', {
            action: 'delivery_success',
            destinationId: job.destinationId,
            jobId: job.id,
            attempt: job.attempt,
            status: outcome.status,
          });
          return ok({
            jobId: job.id,
            destinationId: job.destinationId,
            attempts: job.attempt,
            status: outcome.status,
          });

        case 'permanent':
          return this.failPermanently(job, outcome.reason, outcome.status);

        case 'rate-limited': {
          this.stats?.recordRateLimit(job.destinationId);
          const backoff = computeBackoff(job.attempt, this.config, this.random);
          const delay = outcome.retryAfterMs ?? backoff;
          this.rateLimiter.holdOff(job.destinationId, delay);
          this.logger.warn('Destination rate limited', {
            action: 'delivery_rate_limited',
            destinationId: job.destinationId,
            jobId: job.id,
            attempt: job.attempt,
            retryAfterMs: outcome.retryAfterMs,
          });
          if (!(await this.waitForRetry(job, delay))) {
            return this.failPermanently(job, 'shutdown', lastStatus);
          }
          break;
        }

        case 'retryable': {
          if (job.attempt >= this.config.maxAttempts) break;
          const delay = computeBackoff(job.attempt, this.config, this.random);
          this.logger.warn('Webhook attempt failed, retrying', {
            action: 'delivery_retry',
            destinationId: job.destinationId,
            jobId: job.id,
            attempt: job.attempt,
            delayMs: delay,
            reason: outcome.reason,
          });
          if (!(await this.waitForRetry(job, delay))) {
            return this.failPermanently(job, 'shutdown', lastStatus);
          }
          break;
        }
      }
    }

    return this.failPermanently(
      job,
      `Max retries exceeded after ${String(job.attempt)} attempts`,
      lastStatus,
    );
  }

  /**
   * One attempt under a worker slot and the destination's circuit.
   *
   * @returns null when the circuit rejected the attempt without a call
   */
  private async attempt(
    destination: Readonly<DestinationConfig>,
    job: DeliveryJob,
  ): Promise<AttemptClass | null> {
    if (this.circuitFor(job.destinationId).state === 'open') {
      return null;
    }
    await this.rateLimiter.acquire(job.destinationId, this.cancel.signal);

    return await this.pool.runExclusive(async () => {
      if (this.cancel.signal.aborted) {
        throw new ShutdownSignal();
      }

      const circuit = this.circuitFor(job.destinationId);
      const guarded = await circuit.run(
        async () => await this.call(destination, job),
        breakerVerdict,
      );
      return guarded.ran ? guarded.outcome : null;
    });
  }

  private async call(destination: Readonly<DestinationConfig>, job: DeliveryJob): Promise<AttemptClass> {
    const endTimer = deliveryLatencyHistogram.startTimer({ destination_id: job.destinationId });
    try {
      const response = await this.client.send(destination.targetUrl, job.payload, {
        timeoutMs: this.config.requestTimeoutMs,
        signal: this.cancel.signal,
      });
      endTimer({ status: String(response.status) });
      return classifyStatus(response.status, response.retryAfterMs);
    } catch (error) {
      endTimer({ status: 'error' });
      return classifyTransportError(error);
    }
  }

  /**
   * Sleeps out a backoff without holding a worker slot.
   *
   * @returns false when the wait was cancelled by shutdown
   */
  private async waitForRetry(job: DeliveryJob, delayMs: number): Promise<boolean> {
    if (job.attempt >= this.config.maxAttempts) return true;
    this.stats?.recordRetry(job.destinationId);
    job.nextEligibleAt = this.now() + delayMs;
    try {
      await abortableSleep(delayMs, this.cancel.signal);
      return true;
    } catch {
      return false;
    }
  }

  private circuitFor(destinationId: DestinationId): DestinationCircuit {
    let circuit = this.circuits.get(destinationId);
    if (!circuit) {
      circuit = new DestinationCircuit({
        ...this.breakerConfig,
        destinationId,
        logger: this.logger,
        now: this.now,
        onOpen: (id) => this.stats?.recordCircuitTrip(id),
      });
      this.circuits.set(destinationId, circuit);
    }
    return circuit;
  }

  private dropCircuitOpen(job: DeliveryJob): DeliveryResult {
    job.state = 'dropped-circuit-open';
    this.stats?.recordCircuitDrop(job.destinationId);
    this.logger.warn('Circuit open, dropping delivery', {
      action: 'circuit_open_drop',
      destinationId: job.destinationId,
      jobId: job.id,
      attempt: job.attempt,
    });
    return err(this.failure(job, 'dropped-circuit-open', 'circuit open', null));
  }

  private failPermanently(job: DeliveryJob, reason: string, status: number | null): DeliveryResult {
    job.state = 'failed-permanent';
    this.stats?.recordDeliveryFailure(job.destinationId);
    this.logger.warn('Delivery failed permanently', {
      action: 'delivery_failed',
      destinationId: job.destinationId,
      jobId: job.id,
      attempts: job.attempt,
      status,
      reason,
    });
    return err(this.failure(job, 'failed-permanent', reason, status));
  }

  private failure(
    job: DeliveryJob,
    kind: DeliveryErrorKind,
    reason: string,
    status: number | null,
  ): DeliveryFailure {
    return {
      kind,
      jobId: job.id,
      destinationId: job.destinationId,
      attempts: job.attempt,
      reason,
      status,
    };
  }

  private async waitForDrain(graceMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const elapsed = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const drained = Promise.allSettled(Array.from(this.inFlight)).then(() => true);
    try {
      return await Promise.race([drained, elapsed]);
    } finally {
      clearTimeout(timer);
    }
  }
}
