/**
 * @webhook-relay/core - Stats Aggregator
 *
 * Process-wide counters behind the admin dashboard. Mutators run on the
 * event loop, so each update is atomic with respect to the others;
 * `snapshot()` copies the counters synchronously and never waits on writers.
 * Every mutator also feeds the matching Prometheus counter.
 */

import {
  deliveryOutcomeCounter,
  deliveryRetriesCounter,
  duplicatesSkippedCounter,
  errorsCounter,
  mediaProcessedCounter,
  messagesFilteredCounter,
  messagesReplicatedCounter,
  messagesSeenCounter,
  rateLimitHitsCounter,
  watermarksAppliedCounter,
} from '../metrics/index.js';
import type { DestinationId, MediaKind } from '../types/index.js';

export type ErrorStage = 'ingestion' | 'transform' | 'delivery';

interface DestinationCounters {
  delivered: number;
  failed: number;
  circuitDrops: number;
  backpressureDrops: number;
  retries: number;
  rateLimitHits: number;
  /** Transitions into the open state */
  circuitTrips: number;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
}

export interface DestinationStatsView extends DestinationCounters {
  /** delivered / (delivered + failed); null before the first terminal outcome */
  successRate: number | null;
}

export interface StatsView {
  startTime: string;
  uptimeSeconds: number;
  messagesSeen: number;
  messagesReplicated: number;
  messagesFiltered: number;
  duplicatesSkipped: number;
  mediaProcessed: Record<MediaKind, number>;
  watermarksApplied: number;
  errors: number;
  errorsByStage: Record<ErrorStage, number>;
  deliveryFailures: number;
  circuitDrops: number;
  backpressureDrops: number;
  retries: number;
  rateLimitHits: number;
  circuitTrips: number;
  /** messagesReplicated / (messagesReplicated + deliveryFailures); null when both are 0 */
  successRate: number | null;
  destinations: Record<DestinationId, DestinationStatsView>;
}

function emptyMediaCounters(): Record<MediaKind, number> {
  return { image: 0, video: 0, audio: 0, document: 0 };
}

function successRate(delivered: number, failed: number): number | null {
  const total = delivered + failed;
  return total === 0 ? null : delivered / total;
}

export class StatsAggregator {
  private startTime: number;
  private messagesSeen = 0;
  private messagesReplicated = 0;
  private messagesFiltered = 0;
  private duplicatesSkipped = 0;
  private mediaProcessed = emptyMediaCounters();
  private watermarksApplied = 0;
  private errorsByStage: Record<ErrorStage, number> = { ingestion: 0, transform: 0, delivery: 0 };
  private destinations = new Map<DestinationId, DestinationCounters>();

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  recordSeen(): void {
    this.messagesSeen++;
    messagesSeenCounter.inc();
  }

  recordReplicated(destinationId: DestinationId): void {
    this.messagesReplicated++;
    const counters = this.destination(destinationId);
    counters.delivered++;
    counters.lastSuccessAt = this.now();
    messagesReplicatedCounter.inc({ destination_id: destinationId });
    deliveryOutcomeCounter.inc({ destination_id: destinationId, outcome: 'delivered' });
  }

  recordMediaProcessed(kind: MediaKind): void {
    this.mediaProcessed[kind]++;
    mediaProcessedCounter.inc({ kind });
  }

  recordWatermark(): void {
    this.watermarksApplied++;
    watermarksAppliedCounter.inc();
  }

  recordError(stage: ErrorStage = 'ingestion'): void {
    this.errorsByStage[stage]++;
    errorsCounter.inc({ stage });
  }

  /**
   * A job ended in failed-permanent. Also counted as a delivery-stage error.
   */
  recordDeliveryFailure(destinationId: DestinationId): void {
    const counters = this.destination(destinationId);
    counters.failed++;
    counters.lastFailureAt = this.now();
    deliveryOutcomeCounter.inc({ destination_id: destinationId, outcome: 'failed-permanent' });
    this.recordError('delivery');
  }

  recordFiltered(): void {
    this.messagesFiltered++;
    messagesFilteredCounter.inc();
  }

  recordDuplicate(): void {
    this.duplicatesSkipped++;
    duplicatesSkippedCounter.inc();
  }

  recordCircuitDrop(destinationId: DestinationId): void {
    this.destination(destinationId).circuitDrops++;
    deliveryOutcomeCounter.inc({ destination_id: destinationId, outcome: 'dropped-circuit-open' });
  }

  recordBackpressureDrop(destinationId: DestinationId): void {
    this.destination(destinationId).backpressureDrops++;
    deliveryOutcomeCounter.inc({ destination_id: destinationId, outcome: 'dropped-backpressure' });
  }

  recordRetry(destinationId: DestinationId): void {
    this.destination(destinationId).retries++;
    deliveryRetriesCounter.inc({ destination_id: destinationId });
  }

  recordRateLimit(destinationId: DestinationId): void {
    this.destination(destinationId).rateLimitHits++;
    rateLimitHitsCounter.inc({ destination_id: destinationId });
  }

  recordCircuitTrip(destinationId: DestinationId): void {
    this.destination(destinationId).circuitTrips++;
  }

  /**
   * Per-destination view, or undefined when nothing was recorded for it
   */
  getDestinationStats(destinationId: DestinationId): DestinationStatsView | undefined {
    const counters = this.destinations.get(destinationId);
    if (!counters) return undefined;
    return { ...counters, successRate: successRate(counters.delivered, counters.failed) };
  }

  snapshot(): StatsView {
    const destinations: Record<DestinationId, DestinationStatsView> = {};
    let deliveryFailures = 0;
    let circuitDrops = 0;
    let backpressureDrops = 0;
    let retries = 0;
    let rateLimitHits = 0;
    let circuitTrips = 0;

    for (const [id, counters] of this.destinations) {
      destinations[id] = {
        ...counters,
        successRate: successRate(counters.delivered, counters.failed),
      };
      deliveryFailures += counters.failed;
      circuitDrops += counters.circuitDrops;
      backpressureDrops += counters.backpressureDrops;
      retries += counters.retries;
      rateLimitHits += counters.rateLimitHits;
      circuitTrips += counters.circuitTrips;
    }

    const errorsByStage = { ...this.errorsByStage };
    const now = this.now();

    return {
      startTime: new Date(this.startTime).toISOString(),
      uptimeSeconds: Math.max(0, Math.floor((now - this.startTime) / 1000)),
      messagesSeen: this.messagesSeen,
      messagesReplicated: this.messagesReplicated,
      messagesFiltered: this.messagesFiltered,
      duplicatesSkipped: this.duplicatesSkipped,
      mediaProcessed: { ...this.mediaProcessed },
      watermarksApplied: this.watermarksApplied,
      errors: errorsByStage.ingestion + errorsByStage.transform + errorsByStage.delivery,
      errorsByStage,
      deliveryFailures,
      circuitDrops,
      backpressureDrops,
      retries,
      rateLimitHits,
      circuitTrips,
      successRate: successRate(this.messagesReplicated, deliveryFailures),
      destinations,
    };
  }

  /**
   * Administrative reset. Prometheus counters are left untouched.
   */
  reset(): void {
    this.startTime = this.now();
    this.messagesSeen = 0;
    this.messagesReplicated = 0;
    this.messagesFiltered = 0;
    this.duplicatesSkipped = 0;
    this.mediaProcessed = emptyMediaCounters();
    this.watermarksApplied = 0;
    this.errorsByStage = { ingestion: 0, transform: 0, delivery: 0 };
    this.destinations.clear();
  }

  private destination(destinationId: DestinationId): DestinationCounters {
    let counters = this.destinations.get(destinationId);
    if (!counters) {
      counters = {
        delivered: 0,
        failed: 0,
        circuitDrops: 0,
        backpressureDrops: 0,
        retries: 0,
        rateLimitHits: 0,
        circuitTrips: 0,
        lastSuccessAt: null,
        lastFailureAt: null,
      };
      this.destinations.set(destinationId, counters);
    }
    return counters;
  }
}
