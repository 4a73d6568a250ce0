/**
 * @webhook-relay/core - Prometheus Metrics
 *
 * Counters and histograms for the relay pipeline, registered on a
 * dedicated registry that can be scraped at a /metrics endpoint.
 */

import { Counter, Histogram, Registry } from 'prom-client';

export const metricsRegistry = new Registry();

export const messagesSeenCounter = new Counter({
  name: 'webhook_relay_messages_seen_total',
  help: 'Total number of inbound messages observed',
  registers: [metricsRegistry],
});

export const messagesReplicatedCounter = new Counter({
  name: 'webhook_relay_messages_replicated_total',
  help: 'Total number of messages delivered to a destination',
  labelNames: ['destination_id'],
  registers: [metricsRegistry],
});

export const messagesFilteredCounter = new Counter({
  name: 'webhook_relay_messages_filtered_total',
  help: 'Total number of message/destination pairs rejected by destination filters',
  registers: [metricsRegistry],
});

export const duplicatesSkippedCounter = new Counter({
  name: 'webhook_relay_duplicates_skipped_total',
  help: 'Total number of redelivered source messages skipped by de-duplication',
  registers: [metricsRegistry],
});

export const mediaProcessedCounter = new Counter({
  name: 'webhook_relay_media_processed_total',
  help: 'Total number of media attachments processed, by kind',
  labelNames: ['kind'],
  registers: [metricsRegistry],
});

export const watermarksAppliedCounter = new Counter({
  name: 'webhook_relay_watermarks_applied_total',
  help: 'Total number of payloads watermarked',
  registers: [metricsRegistry],
});

export const errorsCounter = new Counter({
  name: 'webhook_relay_errors_total',
  help: 'Total number of pipeline errors, by stage',
  labelNames: ['stage'],
  registers: [metricsRegistry],
});

export const deliveryOutcomeCounter = new Counter({
  name: 'webhook_relay_delivery_outcomes_total',
  help: 'Terminal delivery job outcomes',
  labelNames: ['destination_id', 'outcome'],
  registers: [metricsRegistry],
});

export const deliveryRetriesCounter = new Counter({
  name: 'webhook_relay_delivery_retries_total',
  help: 'Total number of delivery retries scheduled',
  labelNames: ['destination_id'],
  registers: [metricsRegistry],
});

export const rateLimitHitsCounter = new Counter({
  name: 'webhook_relay_rate_limit_hits_total',
  help: 'Total number of rate-limit responses from destinations',
  labelNames: ['destination_id'],
  registers: [metricsRegistry],
});

export const circuitBreakerOpenCounter = new Counter({
  name: 'webhook_relay_circuit_breaker_open_total',
  help: 'Total number of times a destination circuit opened',
  labelNames: ['destination_id'],
  registers: [metricsRegistry],
});

export const circuitBreakerHalfOpenCounter = new Counter({
  name: 'webhook_relay_circuit_breaker_halfopen_total',
  help: 'Total number of times a destination circuit entered half-open state',
  labelNames: ['destination_id'],
  registers: [metricsRegistry],
});

export const circuitBreakerCloseCounter = new Counter({
  name: 'webhook_relay_circuit_breaker_close_total',
  help: 'Total number of times a destination circuit closed',
  labelNames: ['destination_id'],
  registers: [metricsRegistry],
});

/**
 * Latency of a single webhook call, per attempt
 */
export const deliveryLatencyHistogram = new Histogram({
  name: 'webhook_relay_delivery_latency_seconds',
  help: 'Latency of outbound webhook calls',
  labelNames: ['destination_id', 'status'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [metricsRegistry],
});

export const transformLatencyHistogram = new Histogram({
  name: 'webhook_relay_transform_latency_seconds',
  help: 'Latency of media transforms',
  labelNames: ['kind', 'status'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [metricsRegistry],
});

/**
 * Helper to get metrics in text format for Prometheus scraping
 */
export async function getMetricsText(): Promise<string> {
  return await metricsRegistry.metrics();
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
