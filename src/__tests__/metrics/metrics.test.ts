/**
 * @webhook-relay/core - Prometheus Metrics Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { getMetricsText, resetMetrics } from '../../metrics/index.js';
import { StatsAggregator } from '../../stats/aggregator.js';

describe('Prometheus Metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('should export counters fed by the stats aggregator', async () => {
    const stats = new StatsAggregator();
    stats.recordSeen();
    stats.recordSeen();
    stats.recordReplicated('-1001');
    stats.recordBackpressureDrop('-1001');

    const text = await getMetricsText();
    const lines = text.split('\n');

    expect(lines).toContain('webhook_relay_messages_seen_total 2');
    expect(lines).toContain('webhook_relay_delivery_outcomes_total{destination_id="-1001",outcome="delivered"} 1');
    expect(lines).toContain(
      'webhook_relay_delivery_outcomes_total{destination_id="-1001",outcome="dropped-backpressure"} 1',
    );
  });

  it('should zero counters on reset', async () => {
    new StatsAggregator().recordSeen();

    resetMetrics();

    expect((await getMetricsText()).split('\n')).toContain('webhook_relay_messages_seen_total 0');
  });
});
