/**
 * @webhook-relay/core - Health Check
 *
 * Per-destination and overall health for the admin dashboard and
 * liveness/readiness probes. An open circuit (`down`) and a switched-off
 * destination (`disabled`) are reported separately.
 */

import type { DeliveryService } from '../delivery/service.js';
import type { DestinationConfigStore } from '../destinations/store.js';
import type { StatsAggregator } from '../stats/aggregator.js';
import type { CircuitStateName, DestinationId } from '../types/index.js';

export type DestinationHealthStatus = 'healthy' | 'degraded' | 'down' | 'disabled';

export interface DestinationHealth {
  destinationId: DestinationId;
  name: string;
  enabled: boolean;
  status: DestinationHealthStatus;
  circuitState: CircuitStateName;
  consecutiveFailures: number;
  /** Epoch ms the circuit last opened */
  openedAt: number | null;
  delivered: number;
  failed: number;
  /** null before the first terminal outcome */
  successRate: number | null;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
}

export interface ComponentHealth {
  component: string;
  healthy: boolean;
  status?: string;
  timestamp?: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  components: ComponentHealth[];
  destinations: DestinationHealth[];
}

export interface HealthCheckConfig {
  store: DestinationConfigStore;
  delivery: DeliveryService;
  stats: StatsAggregator;
  /** Durable storage probe (optional) */
  checkStorage?: () => Promise<boolean>;
  /** Ingestion loop state (optional) */
  getIngestionState?: () => string;
}

/**
 * Health of every stored destination, sorted by id
 */
export function getDestinationHealth(
  store: DestinationConfigStore,
  delivery: DeliveryService,
  stats: StatsAggregator,
): DestinationHealth[] {
  return store.listAll().map((destination) => {
    const circuit = delivery.getCircuitSnapshot(destination.id);
    const counters = stats.getDestinationStats(destination.id);

    let status: DestinationHealthStatus;
    if (!destination.enabled) {
      status = 'disabled';
    } else if (circuit.state === 'open') {
      status = 'down';
    } else if (circuit.state === 'half-open' || circuit.consecutiveFailures > 0) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    return {
      destinationId: destination.id,
      name: destination.name,
      enabled: destination.enabled,
      status,
      circuitState: circuit.state,
      consecutiveFailures: circuit.consecutiveFailures,
      openedAt: circuit.openedAt,
      delivered: counters?.delivered ?? 0,
      failed: counters?.failed ?? 0,
      successRate: counters?.successRate ?? null,
      lastSuccessAt: counters?.lastSuccessAt ?? null,
      lastFailureAt: counters?.lastFailureAt ?? null,
    };
  });
}

/**
 * @example
 * ```typescript
 * const health = await performHealthCheck({
 *   store,
 *   delivery,
 *   stats,
 *   checkStorage: async () => (await redis.ping()) === 'PONG',
 * });
 * ```
 */
export async function performHealthCheck(config: HealthCheckConfig): Promise<HealthStatus> {
  const components: ComponentHealth[] = [];
  const timestamp = new Date().toISOString();

  if (config.checkStorage) {
    let storageHealthy = false;
    try {
      storageHealthy = await config.checkStorage();
    } catch {
      storageHealthy = false;
    }
    components.push({
      component: `storage:${config.store.backendKind}`,
      healthy: storageHealthy,
      status: storageHealthy ? 'connected' : 'disconnected',
      timestamp: Date.now(),
    });
  }

  const deliveryStatus = config.delivery.getStatus();
  components.push({
    component: 'delivery',
    healthy: deliveryStatus.accepting,
    status: `${String(deliveryStatus.admitted)}/${String(deliveryStatus.queueSize)} admitted`,
    timestamp: Date.now(),
  });

  if (config.getIngestionState) {
    const state = config.getIngestionState();
    components.push({
      component: 'ingestion',
      healthy: state === 'listening' || state === 'dispatching',
      status: state,
      timestamp: Date.now(),
    });
  }

  const destinations = getDestinationHealth(config.store, config.delivery, config.stats);
  const enabled = destinations.filter((d) => d.enabled);
  const allComponentsHealthy = components.every((c) => c.healthy);
  const allEnabledDown = enabled.length > 0 && enabled.every((d) => d.status === 'down');
  const anyImpaired = enabled.some((d) => d.status === 'down' || d.status === 'degraded');

  const status = !allComponentsHealthy || allEnabledDown
    ? 'unhealthy'
    : anyImpaired
      ? 'degraded'
      : 'healthy';

  return { status, timestamp, components, destinations };
}

/**
 * Ready for traffic: every component is healthy
 */
export function isReady(health: HealthStatus): boolean {
  return health.components.every((c) => c.healthy);
}

/**
 * Alive: not unhealthy
 */
export function isLive(health: HealthStatus): boolean {
  return health.status !== 'unhealthy';
}
