/**
 * @webhook-relay/core - Destination Config Store
 *
 * Durable, keyed store of destination settings.
 * - Reads are synchronous against an in-memory map of frozen records
 * - Writes are serialized per destination id and persisted before they
 *   become visible
 * - reload() swaps in a freshly read map; writes that land while a reload
 *   is reading are carried over into the new map
 */

import { Mutex } from 'async-mutex';

import { ConfigValidationError, DestinationNotFoundError } from '../errors/relay-errors.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import type { ChatId, DestinationConfig, DestinationId } from '../types/index.js';
import { parseDestinationInput, type DestinationInput } from '../validation/schemas.js';
import type { DestinationBackend } from './backend.js';
import { freezeDestination } from './codec.js';

export interface DestinationStoreOptions {
  logger?: StructuredLogger;
  now?: () => Date;
}

type Snapshot = Map<DestinationId, Readonly<DestinationConfig>>;

export class DestinationConfigStore {
  private records: Snapshot = new Map();
  private readonly writeMutexes = new Map<DestinationId, Mutex>();
  private readonly reloadMutex = new Mutex();
  /** Writes applied while a reload is reading the backend; null when idle */
  private writesDuringReload: Map<DestinationId, Readonly<DestinationConfig> | null> | null = null;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;

  constructor(
    private readonly backend: DestinationBackend,
    options: DestinationStoreOptions = {},
  ) {
    this.logger = options.logger ?? new NullLogger();
    this.now = options.now ?? (() => new Date());
  }

  get backendKind(): DestinationBackend['kind'] {
    return this.backend.kind;
  }

  get(destinationId: DestinationId): Readonly<DestinationConfig> | undefined {
    return this.records.get(destinationId);
  }

  /**
   * @throws {DestinationNotFoundError}
   */
  require(destinationId: DestinationId): Readonly<DestinationConfig> {
    const config = this.records.get(destinationId);
    if (!config) {
      throw new DestinationNotFoundError(destinationId);
    }
    return config;
  }

  /**
   * Destinations fed by a source chat. Destination ids equal chat ids,
   * so this is at most one record today.
   */
  findForChat(chatId: ChatId): Readonly<DestinationConfig>[] {
    const config = this.records.get(chatId);
    return config ? [config] : [];
  }

  listAll(): Readonly<DestinationConfig>[] {
    return Array.from(this.records.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Validates, persists and publishes a destination. Creation time is kept
   * across updates.
   *
   * @throws {ConfigValidationError} naming the offending field; nothing is written
   * @throws {StorageError} when the backend write fails; nothing is published
   */
  async upsert(input: DestinationInput): Promise<Readonly<DestinationConfig>> {
    const parsed = parseDestinationInput(input);

    return await this.getMutex(parsed.id).runExclusive(async () => {
      const existing = this.records.get(parsed.id);
      const timestamp = this.now();
      const record = freezeDestination({
        ...parsed,
        name: parsed.name ?? existing?.name ?? parsed.id,
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
      });

      await this.backend.save(record);
      this.publish(record.id, record);

      this.logger.info('Destination saved', {
        action: existing ? 'destination_updated' : 'destination_created',
        destinationId: record.id,
        enabled: record.enabled,
        watermarkMode: record.watermark.mode,
      });
      return record;
    });
  }

  /**
   * @returns false when the destination did not exist
   */
  async delete(destinationId: DestinationId): Promise<boolean> {
    return await this.getMutex(destinationId).runExclusive(async () => {
      const existedInMemory = this.records.has(destinationId);
      const existedDurably = await this.backend.remove(destinationId);
      this.publish(destinationId, null);

      const existed = existedInMemory || existedDurably;
      if (existed) {
        this.logger.info('Destination deleted', {
          action: 'destination_deleted',
          destinationId,
        });
      }
      return existed;
    });
  }

  /**
   * Re-reads durable storage and atomically replaces the in-memory map.
   */
  async reload(): Promise<number> {
    return await this.reloadMutex.runExclusive(async () => {
      const overlay = new Map<DestinationId, Readonly<DestinationConfig> | null>();
      this.writesDuringReload = overlay;

      try {
        const loaded = await this.backend.loadAll();
        const next: Snapshot = new Map();
        for (const config of loaded) {
          next.set(config.id, freezeDestination(config));
        }
        for (const [id, record] of overlay) {
          if (record) {
            next.set(id, record);
          } else {
            next.delete(id);
          }
        }
        this.records = next;
      } finally {
        this.writesDuringReload = null;
      }

      this.logger.debug('Destinations reloaded', {
        action: 'destinations_reloaded',
        count: this.records.size,
        backend: this.backend.kind,
      });
      return this.records.size;
    });
  }

  /**
   * Writes bootstrap destinations that are not stored yet; stored ones win.
   *
   * @returns ids that were created
   */
  async seed(inputs: DestinationInput[]): Promise<DestinationId[]> {
    const created: DestinationId[] = [];
    for (const input of inputs) {
      if (this.records.has(input.id.trim())) continue;
      try {
        const record = await this.upsert(input);
        created.push(record.id);
      } catch (error) {
        if (!(error instanceof ConfigValidationError)) throw error;
        this.logger.warn('Skipping invalid bootstrap destination', {
          action: 'destination_seed_rejected',
          destinationId: input.id,
          field: error.field,
          reason: error.message,
        });
      }
    }
    return created;
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  private publish(id: DestinationId, record: Readonly<DestinationConfig> | null): void {
    if (record) {
      this.records.set(id, record);
    } else {
      this.records.delete(id);
    }
    this.writesDuringReload?.set(id, record);
  }

  private getMutex(destinationId: DestinationId): Mutex {
    let mutex = this.writeMutexes.get(destinationId);
    if (!mutex) {
      mutex = new Mutex();
      this.writeMutexes.set(destinationId, mutex);
    }
    return mutex;
  }
}
