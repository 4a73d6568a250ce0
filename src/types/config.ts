/**
 * @webhook-relay/core - Relay Configuration Types
 */

export type RelayEnvironment = 'development' | 'production' | 'test';

/**
 * Delivery worker pool, retry and pacing settings
 */
export interface DeliveryConfig {
  /** Concurrent outbound webhook calls */
  maxConcurrency: number;
  /** Jobs admitted (running + waiting) before backpressure drops */
  queueSize: number;
  /** Total attempts per job, first attempt included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter factor in [0, 1]; 0.5 means ±50% */
  jitter: number;
  /** Timeout applied to every outbound call */
  requestTimeoutMs: number;
  /** Outbound calls allowed per destination within `rateWindowMs` */
  requestsPerWindow: number;
  rateWindowMs: number;
}

export interface CircuitBreakerConfig {
  /** Consecutive counted failures that open the circuit */
  failureThreshold: number;
  /** Time spent open before a half-open trial is allowed */
  recoveryTimeoutMs: number;
}

export interface DedupConfig {
  /** Source message ids remembered per chat */
  windowSize: number;
  /** Optional age limit of remembered ids; 0 disables it */
  ttlMs: number;
  /** Chats tracked before the least recently active is forgotten */
  maxChats: number;
}

export interface ValidatorConfig {
  timeoutMs: number;
  /** Status the destination returns for an accepted message */
  acceptedStatus: number;
  probeContent: string;
  probeUsername: string;
}

export interface TransformConfig {
  /** Overlay assets kept decoded in memory */
  overlayCacheSize: number;
  /** Pixel margin used by non-custom positions */
  margin: number;
  baselineQuality: number;
  minQuality: number;
  qualityStep: number;
  /** Bounding box images are fitted into when they exceed the size ceiling */
  maxWidth: number;
  maxHeight: number;
}

export interface StorageConfig {
  backend: 'file' | 'redis' | 'memory';
  /** Directory holding one JSON file per destination (file backend) */
  directory: string;
  redisUrl?: string;
  keyPrefix: string;
  /** 64 hex characters; enables at-rest encryption of webhook URLs */
  masterKey?: string;
}

export interface RelayConfig {
  environment: RelayEnvironment;
  delivery: DeliveryConfig;
  circuitBreaker: CircuitBreakerConfig;
  dedup: DedupConfig;
  validator: ValidatorConfig;
  transform: TransformConfig;
  storage: StorageConfig;
}
