/**
 * @webhook-relay/core - Environment Configuration
 *
 * Builds a RelayConfig from RELAY_* variables layered over a preset, and
 * reads bootstrap destinations declared as WEBHOOK_<chatId>=<url>.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

import type { LogContext, StructuredLogger } from '../logger/index.js';
import { NullLogger } from '../logger/index.js';
import type {
  CircuitBreakerConfig,
  DedupConfig,
  DeliveryConfig,
  RelayConfig,
  StorageConfig,
} from '../types/config.js';
import type { DestinationInput } from '../validation/schemas.js';
import { isWebhookUrl, parseRelayConfig, toConfigIssues } from '../validation/schemas.js';
import { ConfigValidationError } from '../errors/relay-errors.js';
import { createRelayConfigFromPreset, type PresetName } from './presets.js';

const ENVIRONMENT_TO_PRESET: Record<string, PresetName> = {
  development: 'DEVELOPMENT',
  production: 'PRODUCTION',
  test: 'TESTING',
};

const optionalInt = z.coerce.number().int().optional();

const RelayEnvSchema = z.object({
  RELAY_ENV: z
    .enum(['development', 'production', 'test'], {
      errorMap: () => ({ message: 'RELAY_ENV must be "development", "production", or "test"' }),
    })
    .default('production'),
  RELAY_MAX_CONCURRENCY: optionalInt,
  RELAY_QUEUE_SIZE: optionalInt,
  RELAY_MAX_ATTEMPTS: optionalInt,
  RELAY_BASE_DELAY_MS: optionalInt,
  RELAY_MAX_DELAY_MS: optionalInt,
  RELAY_REQUEST_TIMEOUT_MS: optionalInt,
  RELAY_RATE_LIMIT: optionalInt,
  RELAY_CIRCUIT_THRESHOLD: optionalInt,
  RELAY_CIRCUIT_RECOVERY_MS: optionalInt,
  RELAY_DEDUP_WINDOW: optionalInt,
  RELAY_STORAGE: z.enum(['file', 'redis', 'memory']).optional(),
  RELAY_CONFIG_DIR: z.string().min(1).optional(),
  RELAY_REDIS_URL: z.string().min(1).optional(),
  RELAY_MASTER_KEY: z.string().min(1).optional(),
});

/**
 * Loads a .env file into `process.env`. Existing variables win.
 */
export function loadDotenvFile(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}

/**
 * Build the relay configuration from environment variables.
 *
 * @throws {ConfigValidationError} when a variable holds an invalid value
 */
export function loadRelayConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = RelayEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(toConfigIssues(parsed.error));
  }
  const vars = parsed.data;
  const presetName = ENVIRONMENT_TO_PRESET[vars.RELAY_ENV] ?? 'PRODUCTION';

  const delivery: Partial<DeliveryConfig> = {};
  setIfDefined(delivery, 'maxConcurrency', vars.RELAY_MAX_CONCURRENCY);
  setIfDefined(delivery, 'queueSize', vars.RELAY_QUEUE_SIZE);
  setIfDefined(delivery, 'maxAttempts', vars.RELAY_MAX_ATTEMPTS);
  setIfDefined(delivery, 'baseDelayMs', vars.RELAY_BASE_DELAY_MS);
  setIfDefined(delivery, 'maxDelayMs', vars.RELAY_MAX_DELAY_MS);
  setIfDefined(delivery, 'requestTimeoutMs', vars.RELAY_REQUEST_TIMEOUT_MS);
  setIfDefined(delivery, 'requestsPerWindow', vars.RELAY_RATE_LIMIT);

  const circuitBreaker: Partial<CircuitBreakerConfig> = {};
  setIfDefined(circuitBreaker, 'failureThreshold', vars.RELAY_CIRCUIT_THRESHOLD);
  setIfDefined(circuitBreaker, 'recoveryTimeoutMs', vars.RELAY_CIRCUIT_RECOVERY_MS);

  const dedup: Partial<DedupConfig> = {};
  setIfDefined(dedup, 'windowSize', vars.RELAY_DEDUP_WINDOW);

  const storage: Partial<StorageConfig> = {};
  setIfDefined(storage, 'backend', vars.RELAY_STORAGE);
  setIfDefined(storage, 'directory', vars.RELAY_CONFIG_DIR);
  setIfDefined(storage, 'redisUrl', vars.RELAY_REDIS_URL);
  setIfDefined(storage, 'masterKey', vars.RELAY_MASTER_KEY);

  const config = createRelayConfigFromPreset(presetName, {
    delivery,
    circuitBreaker,
    dedup,
    storage,
  });

  return parseRelayConfig(config);
}

/**
 * Collect bootstrap destinations declared as `WEBHOOK_<chatId>=<url>`.
 * Group ids are negative; a bare number gets its leading `-` restored.
 * Entries with a malformed id or URL are skipped with a warning.
 */
export function loadDestinationsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger: StructuredLogger = new NullLogger(),
): DestinationInput[] {
  const destinations: DestinationInput[] = [];

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('WEBHOOK_') || !value) continue;

    const rawId = key.slice('WEBHOOK_'.length);
    const context: LogContext = { action: 'env_destination_skipped', key };

    if (!/^-?\d+$/.test(rawId)) {
      logger.warn('Ignoring webhook variable with non-numeric chat id', context);
      continue;
    }
    if (!isWebhookUrl(value)) {
      logger.warn('Ignoring webhook variable with malformed URL', context);
      continue;
    }

    const id = rawId.startsWith('-') ? rawId : `-${rawId}`;
    destinations.push({ id, name: `Chat ${id}`, targetUrl: value.trim() });
  }

  return destinations.sort((a, b) => a.id.localeCompare(b.id));
}

function setIfDefined<T, K extends keyof T>(
  target: Partial<T>,
  key: K,
  value: T[K] | undefined,
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}
