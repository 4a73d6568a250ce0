export { getDestinationHealth, performHealthCheck, isReady, isLive } from './health-check.js';
export type {
  ComponentHealth,
  DestinationHealth,
  DestinationHealthStatus,
  HealthCheckConfig,
  HealthStatus,
} from './health-check.js';
