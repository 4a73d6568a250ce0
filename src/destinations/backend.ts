/**
 * @webhook-relay/core - Destination Backends
 *
 * Durable storage contract for destination records, one record per
 * destination, plus an in-memory implementation for tests and ephemeral runs.
 */

import type { DestinationConfig, DestinationId } from '../types/index.js';
import { deserializeDestination, serializeDestination } from './codec.js';
import type { SecretCodec } from './secret-codec.js';

export interface DestinationBackend {
  readonly kind: 'file' | 'redis' | 'memory';
  /** Reads every stored record */
  loadAll(): Promise<DestinationConfig[]>;
  /** Durably writes one record, replacing any previous version atomically */
  save(config: DestinationConfig): Promise<void>;
  /** Returns false when no record existed */
  remove(id: DestinationId): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Keeps serialized records in a Map. Records still go through the codec so
 * the in-memory copy behaves like a durable one.
 */
export class MemoryDestinationBackend implements DestinationBackend {
  readonly kind = 'memory' as const;
  private readonly documents = new Map<DestinationId, string>();

  constructor(private readonly secrets?: SecretCodec) {}

  loadAll(): Promise<DestinationConfig[]> {
    return Promise.resolve(
      Array.from(this.documents.values(), (raw) => deserializeDestination(raw, this.secrets)),
    );
  }

  save(config: DestinationConfig): Promise<void> {
    this.documents.set(config.id, serializeDestination(config, this.secrets));
    return Promise.resolve();
  }

  remove(id: DestinationId): Promise<boolean> {
    return Promise.resolve(this.documents.delete(id));
  }

  /**
   * Raw stored document, for inspection
   */
  getRaw(id: DestinationId): string | undefined {
    return this.documents.get(id);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
