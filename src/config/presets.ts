/**
 * @webhook-relay/core - Configuration Presets
 *
 * Pre-configured presets for different environments
 */

import type {
  CircuitBreakerConfig,
  DedupConfig,
  DeliveryConfig,
  RelayConfig,
  StorageConfig,
  TransformConfig,
  ValidatorConfig,
} from '../types/config.js';
import { RelayConfigSchema, toConfigIssues } from '../validation/schemas.js';

/**
 * Configuration Preset
 * Everything but storage, which is always deployment specific
 */
export interface ConfigPreset {
  environment: RelayConfig['environment'];
  delivery: DeliveryConfig;
  circuitBreaker: CircuitBreakerConfig;
  dedup: DedupConfig;
  validator: ValidatorConfig;
  transform: TransformConfig;
}

const VALIDATOR_DEFAULTS: ValidatorConfig = {
  timeoutMs: 10000,
  acceptedStatus: 204,
  probeContent: 'Webhook connectivity check',
  probeUsername: 'Relay Validator',
};

const TRANSFORM_DEFAULTS: TransformConfig = {
  overlayCacheSize: 32,
  margin: 20,
  baselineQuality: 90,
  minQuality: 60,
  qualityStep: 10,
  maxWidth: 1920,
  maxHeight: 1080,
};

/**
 * DEVELOPMENT Preset
 *
 * - Few retries with short delays to fail fast while iterating
 * - Circuit recovers after 10s
 *
 * Use Case: Development, debugging, local testing
 */
export const DEVELOPMENT: ConfigPreset = {
  environment: 'development',
  delivery: {
    maxConcurrency: 2,
    queueSize: 200,
    maxAttempts: 2,
    baseDelayMs: 250,
    maxDelayMs: 5000,
    jitter: 0.5,
    requestTimeoutMs: 15000,
    requestsPerWindow: 5,
    rateWindowMs: 2000,
  },
  circuitBreaker: {
    failureThreshold: 5,
    recoveryTimeoutMs: 10000,
  },
  dedup: {
    windowSize: 500,
    ttlMs: 0,
    maxChats: 1000,
  },
  validator: VALIDATOR_DEFAULTS,
  transform: TRANSFORM_DEFAULTS,
};

/**
 * PRODUCTION Preset
 *
 * - 3 attempts, backoff from 1s capped at 30s, ±50% jitter
 * - Circuit opens after 5 consecutive failures, probes after 60s
 * - Pacing of 5 calls per 2s per destination
 *
 * Use Case: Production deployments
 */
export const PRODUCTION: ConfigPreset = {
  environment: 'production',
  delivery: {
    maxConcurrency: 4,
    queueSize: 1000,
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    jitter: 0.5,
    requestTimeoutMs: 15000,
    requestsPerWindow: 5,
    rateWindowMs: 2000,
  },
  circuitBreaker: {
    failureThreshold: 5,
    recoveryTimeoutMs: 60000,
  },
  dedup: {
    windowSize: 1000,
    ttlMs: 24 * 60 * 60 * 1000,
    maxChats: 10000,
  },
  validator: VALIDATOR_DEFAULTS,
  transform: TRANSFORM_DEFAULTS,
};

/**
 * TESTING Preset
 *
 * - Millisecond delays and timeouts so tests run quickly
 * - No jitter, so delays are deterministic
 *
 * Use Case: Unit tests, integration tests, E2E tests
 */
export const TESTING: ConfigPreset = {
  environment: 'test',
  delivery: {
    maxConcurrency: 2,
    queueSize: 50,
    maxAttempts: 3,
    baseDelayMs: 10,
    maxDelayMs: 100,
    jitter: 0,
    requestTimeoutMs: 1000,
    requestsPerWindow: 1000,
    rateWindowMs: 1000,
  },
  circuitBreaker: {
    failureThreshold: 3,
    recoveryTimeoutMs: 200,
  },
  dedup: {
    windowSize: 100,
    ttlMs: 0,
    maxChats: 100,
  },
  validator: { ...VALIDATOR_DEFAULTS, timeoutMs: 1000 },
  transform: TRANSFORM_DEFAULTS,
};

/**
 * Preset Registry
 */
export const PRESETS = {
  DEVELOPMENT,
  PRODUCTION,
  TESTING,
} as const;

export type PresetName = keyof typeof PRESETS;

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

const DEFAULT_STORAGE: StorageConfig = {
  backend: 'file',
  directory: './data/destinations',
  keyPrefix: 'relay:destination:',
};

/**
 * Overrides accepted on top of a preset
 */
export interface RelayConfigOverrides {
  delivery?: Partial<DeliveryConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  dedup?: Partial<DedupConfig>;
  validator?: Partial<ValidatorConfig>;
  transform?: Partial<TransformConfig>;
  storage?: Partial<StorageConfig>;
}

/**
 * Create a RelayConfig from a preset
 *
 * @example
 * ```typescript
 * const config = createRelayConfigFromPreset('PRODUCTION', {
 *   storage: { backend: 'redis', redisUrl: 'redis://localhost:6379' },
 * });
 * ```
 */
export function createRelayConfigFromPreset(
  presetName: PresetName,
  overrides: RelayConfigOverrides = {},
): RelayConfig {
  const preset = PRESETS[presetName];

  return {
    environment: preset.environment,
    delivery: { ...preset.delivery, ...overrides.delivery },
    circuitBreaker: { ...preset.circuitBreaker, ...overrides.circuitBreaker },
    dedup: { ...preset.dedup, ...overrides.dedup },
    validator: { ...preset.validator, ...overrides.validator },
    transform: { ...preset.transform, ...overrides.transform },
    storage: { ...DEFAULT_STORAGE, ...overrides.storage },
  };
}

/**
 * Get preset by name
 */
export function getPreset(name: PresetName): ConfigPreset {
  return PRESETS[name];
}

/**
 * Validate preset configuration
 *
 * @returns Array of validation errors (empty if valid)
 */
export function validatePreset(preset: ConfigPreset): string[] {
  const result = RelayConfigSchema.safeParse({ ...preset, storage: DEFAULT_STORAGE });
  if (result.success) {
    return [];
  }
  return toConfigIssues(result.error).map((issue) => `${issue.field}: ${issue.message}`);
}
