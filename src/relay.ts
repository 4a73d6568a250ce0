/**
 * @webhook-relay/core - Relay
 *
 * Wires the destination store, transform engine, delivery service,
 * webhook validator, stats and ingestion loop together and exposes the
 * administrative surface used by a dashboard or API layer.
 *
 * @example
 * ```typescript
 * const relay = createRelay({
 *   config: createRelayConfigFromPreset('PRODUCTION'),
 *   source,
 *   bootstrap: loadDestinationsFromEnv(process.env),
 * });
 * await relay.start();
 * await relay.upsertDestination(
 *   { id: '-1001', targetUrl: 'https://discord.com/api/webhooks/1/token' },
 *   { probe: true },
 * );
 * ```
 */

import { Redis } from 'ioredis';

import { AxiosWebhookClient, type WebhookClient } from './delivery/webhook-client.js';
import { DeliveryService } from './delivery/service.js';
import { MemoryDestinationBackend, type DestinationBackend } from './destinations/backend.js';
import { FileDestinationBackend } from './destinations/file-backend.js';
import { RedisDestinationBackend } from './destinations/redis-backend.js';
import { SecretCodec } from './destinations/secret-codec.js';
import { DestinationConfigStore } from './destinations/store.js';
import { RelayError } from './errors/relay-errors.js';
import { performHealthCheck, type HealthStatus } from './health/health-check.js';
import { DedupWindow } from './ingestion/dedup.js';
import { IngestionLoop, type IngestionState } from './ingestion/ingestion-loop.js';
import type { SourceClient } from './ingestion/source.js';
import { ConsoleStructuredLogger, type StructuredLogger } from './logger/index.js';
import { getMetricsText } from './metrics/index.js';
import { StatsAggregator, type StatsView } from './stats/aggregator.js';
import type { RelayConfig, StorageConfig } from './types/config.js';
import type { CircuitSnapshot, DestinationConfig, DestinationId } from './types/index.js';
import { parseDestinationInput, parseRelayConfig, type DestinationInput } from './validation/schemas.js';
import { WebhookValidator, type WebhookValidation } from './validator/webhook-validator.js';
import { OverlayCache } from './watermark/overlay-cache.js';
import { TransformEngine } from './watermark/engine.js';

export interface RelayOptions {
  config: RelayConfig;
  source: SourceClient;
  logger?: StructuredLogger;
  /** Replaces the backend built from `config.storage` */
  backend?: DestinationBackend;
  /** Redis client for the redis backend; created from `redisUrl` when omitted */
  redis?: Redis;
  webhookClient?: WebhookClient;
  overlayCache?: OverlayCache;
  /** Destinations written at start() unless already stored */
  bootstrap?: DestinationInput[];
  now?: () => number;
  random?: () => number;
}

export interface UpsertOptions {
  /** Send a probe message to the webhook before saving */
  probe?: boolean;
}

interface StorageSetup {
  backend: DestinationBackend;
  checkStorage?: () => Promise<boolean>;
}

function createStorage(
  storage: StorageConfig,
  logger: StructuredLogger,
  redis?: Redis,
): StorageSetup {
  const secrets = storage.masterKey ? new SecretCodec(storage.masterKey) : undefined;

  switch (storage.backend) {
    case 'memory':
      return { backend: new MemoryDestinationBackend(secrets) };
    case 'file':
      return { backend: new FileDestinationBackend({ directory: storage.directory, secrets, logger }) };
    case 'redis': {
      const client = redis ?? new Redis(storage.redisUrl ?? 'redis://localhost:6379', { lazyConnect: true });
      return {
        backend: new RedisDestinationBackend(client, {
          keyPrefix: storage.keyPrefix,
          secrets,
          logger,
          ownsClient: redis === undefined,
        }),
        checkStorage: async () => (await client.ping()) === 'PONG',
      };
    }
  }
}

export class Relay {
  readonly store: DestinationConfigStore;
  readonly engine: TransformEngine;
  readonly delivery: DeliveryService;
  readonly validator: WebhookValidator;
  readonly stats: StatsAggregator;
  readonly loop: IngestionLoop;

  private readonly logger: StructuredLogger;
  private readonly overlayCache: OverlayCache;
  private readonly bootstrap: DestinationInput[];
  private readonly checkStorage?: () => Promise<boolean>;

  constructor(options: RelayOptions) {
    const config = parseRelayConfig(options.config);
    this.logger = options.logger ?? new ConsoleStructuredLogger(config.environment);
    this.bootstrap = options.bootstrap ?? [];

    const storage: StorageSetup = options.backend
      ? { backend: options.backend }
      : createStorage(config.storage, this.logger, options.redis);
    this.checkStorage = storage.checkStorage;

    const now = options.now;
    this.stats = new StatsAggregator(now);
    this.store = new DestinationConfigStore(storage.backend, {
      logger: this.logger,
      now: now ? () => new Date(now()) : undefined,
    });
    this.overlayCache =
      options.overlayCache ?? new OverlayCache({ max: config.transform.overlayCacheSize });
    this.engine = new TransformEngine({
      overlayCache: this.overlayCache,
      config: config.transform,
      logger: this.logger,
      stats: this.stats,
    });

    const client = options.webhookClient ?? new AxiosWebhookClient();
    this.delivery = new DeliveryService({
      client,
      config: config.delivery,
      circuitBreaker: config.circuitBreaker,
      resolveDestination: (id) => this.store.get(id),
      stats: this.stats,
      logger: this.logger,
      random: options.random,
      now: options.now,
    });
    this.validator = new WebhookValidator(client, config.validator, this.logger, options.now);
    this.loop = new IngestionLoop({
      source: options.source,
      store: this.store,
      engine: this.engine,
      delivery: this.delivery,
      stats: this.stats,
      dedup: new DedupWindow(config.dedup),
      logger: this.logger,
      environment: config.environment,
    });
  }

  /**
   * Loads stored destinations, writes missing bootstrap ones, then starts
   * listening.
   *
   * @throws {StartupError} when the source cannot be reached
   */
  async start(): Promise<void> {
    await this.store.reload();
    if (this.bootstrap.length > 0) {
      const created = await this.store.seed(this.bootstrap);
      this.logger.info('Bootstrap destinations applied', {
        action: 'destinations_seeded',
        created: created.length,
        offered: this.bootstrap.length,
      });
    }
    await this.loop.start();
  }

  /**
   * Stops ingestion, drains deliveries for up to `graceMs`, closes storage.
   */
  async stop(graceMs = 5000): Promise<void> {
    await this.loop.stop();
    await this.delivery.shutdown(graceMs);
    await this.store.close();
    this.overlayCache.clear();
  }

  /**
   * @throws {ConfigValidationError} when the input is rejected; nothing is stored
   * @throws {RelayError} ERR_WEBHOOK_PROBE_FAILED (or ERR_TIMEOUT) when probing fails
   */
  async upsertDestination(
    input: DestinationInput,
    options: UpsertOptions = {},
  ): Promise<Readonly<DestinationConfig>> {
    const parsed = parseDestinationInput(input);

    if (options.probe) {
      const validation = await this.validator.validate(parsed.targetUrl);
      if (!validation.ok) {
        throw new RelayError(validation.error.code, validation.error.message);
      }
    }

    return await this.store.upsert(input);
  }

  async deleteDestination(destinationId: DestinationId): Promise<boolean> {
    const deleted = await this.store.delete(destinationId);
    this.delivery.forgetDestination(destinationId);
    return deleted;
  }

  getDestination(destinationId: DestinationId): Readonly<DestinationConfig> | undefined {
    return this.store.get(destinationId);
  }

  listDestinations(): Readonly<DestinationConfig>[] {
    return this.store.listAll();
  }

  async validateWebhook(url: string): Promise<WebhookValidation> {
    return await this.validator.validate(url);
  }

  getCircuit(destinationId: DestinationId): CircuitSnapshot {
    return this.delivery.getCircuitSnapshot(destinationId);
  }

  getStats(): StatsView {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
    this.logger.info('Stats reset', { action: 'stats_reset' });
  }

  get ingestionState(): IngestionState {
    return this.loop.state;
  }

  async getHealth(): Promise<HealthStatus> {
    return await performHealthCheck({
      store: this.store,
      delivery: this.delivery,
      stats: this.stats,
      checkStorage: this.checkStorage,
      getIngestionState: () => this.loop.state,
    });
  }

  async getMetricsText(): Promise<string> {
    return await getMetricsText();
  }
}

export function createRelay(options: RelayOptions): Relay {
  return new Relay(options);
}
