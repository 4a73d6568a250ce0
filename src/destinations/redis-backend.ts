/**
 * @webhook-relay/core - Redis Destination Backend
 *
 * One string key per destination (`<prefix><id>`) plus a set indexing the
 * ids. Record and index are updated together in a MULTI transaction.
 */

import type { Redis } from 'ioredis';

import { StorageError } from '../errors/relay-errors.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import type { DestinationConfig, DestinationId } from '../types/index.js';
import type { DestinationBackend } from './backend.js';
import { deserializeDestination, serializeDestination } from './codec.js';
import type { SecretCodec } from './secret-codec.js';

export interface RedisBackendOptions {
  keyPrefix?: string;
  secrets?: SecretCodec;
  logger?: StructuredLogger;
  /** Quit the client on close(); set when the backend created the client */
  ownsClient?: boolean;
}

export class RedisDestinationBackend implements DestinationBackend {
  readonly kind = 'redis' as const;
  private readonly keyPrefix: string;
  private readonly secrets?: SecretCodec;
  private readonly logger: StructuredLogger;
  private readonly ownsClient: boolean;

  constructor(
    private readonly redis: Redis,
    options: RedisBackendOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? 'relay:destination:';
    this.secrets = options.secrets;
    this.logger = options.logger ?? new NullLogger();
    this.ownsClient = options.ownsClient ?? false;
  }

  private key(id: DestinationId): string {
    return `${this.keyPrefix}${id}`;
  }

  private get indexKey(): string {
    return `${this.keyPrefix}__index`;
  }

  async loadAll(): Promise<DestinationConfig[]> {
    try {
      const ids = (await this.redis.smembers(this.indexKey)).sort();
      if (ids.length === 0) return [];

      const documents = await this.redis.mget(ids.map((id) => this.key(id)));
      const configs: DestinationConfig[] = [];

      documents.forEach((raw, index) => {
        if (raw === null) {
          this.logger.warn('Destination index references a missing record', {
            action: 'destination_record_missing',
            destinationId: ids[index],
          });
          return;
        }
        try {
          configs.push(deserializeDestination(raw, this.secrets));
        } catch (error) {
          this.logger.error('Skipping unreadable destination record', error, {
            action: 'destination_record_skipped',
            destinationId: ids[index],
          });
        }
      });

      return configs;
    } catch (error) {
      throw new StorageError('Failed to load destinations from Redis', 'redis', error);
    }
  }

  async save(config: DestinationConfig): Promise<void> {
    const results = await this.redis
      .multi()
      .set(this.key(config.id), serializeDestination(config, this.secrets))
      .sadd(this.indexKey, config.id)
      .exec()
      .catch((error: unknown) => {
        throw new StorageError(`Failed to write destination ${config.id}`, 'redis', error);
      });

    const failure = results?.find(([error]) => error !== null);
    if (!results || failure) {
      throw new StorageError(`Failed to write destination ${config.id}`, 'redis', failure?.[0]);
    }
  }

  async remove(id: DestinationId): Promise<boolean> {
    const results = await this.redis
      .multi()
      .del(this.key(id))
      .srem(this.indexKey, id)
      .exec()
      .catch((error: unknown) => {
        throw new StorageError(`Failed to delete destination ${id}`, 'redis', error);
      });

    if (!results) {
      throw new StorageError(`Failed to delete destination ${id}`, 'redis');
    }
    const [deleted] = results;
    return deleted?.[1] === 1;
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.redis.quit();
    }
  }
}
