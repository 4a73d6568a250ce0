/**
 * @webhook-relay/core - File Destination Backend
 *
 * One JSON document per destination at `<directory>/destination_<id>.json`.
 * Writes go to a temporary file that is renamed over the target, so a
 * crash never leaves a half-written record behind.
 */

import { randomBytes } from 'crypto';
import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';

import { StorageError } from '../errors/relay-errors.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import type { DestinationConfig, DestinationId } from '../types/index.js';
import type { DestinationBackend } from './backend.js';
import { deserializeDestination, serializeDestination } from './codec.js';
import type { SecretCodec } from './secret-codec.js';

const FILE_PATTERN = /^destination_(.+)\.json$/;

export interface FileBackendOptions {
  directory: string;
  secrets?: SecretCodec;
  logger?: StructuredLogger;
}

export class FileDestinationBackend implements DestinationBackend {
  readonly kind = 'file' as const;
  private readonly directory: string;
  private readonly secrets?: SecretCodec;
  private readonly logger: StructuredLogger;

  constructor(options: FileBackendOptions) {
    this.directory = options.directory;
    this.secrets = options.secrets;
    this.logger = options.logger ?? new NullLogger();
  }

  fileFor(id: DestinationId): string {
    return join(this.directory, `destination_${id}.json`);
  }

  /**
   * Reads all records. A file that cannot be parsed is logged and skipped
   * so one bad record does not hide the others.
   */
  async loadAll(): Promise<DestinationConfig[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageError(`Failed to list ${this.directory}`, 'file', error);
    }

    const configs: DestinationConfig[] = [];
    for (const entry of entries.sort()) {
      if (!FILE_PATTERN.test(entry)) continue;

      const path = join(this.directory, entry);
      try {
        const raw = await readFile(path, 'utf8');
        configs.push(deserializeDestination(raw, this.secrets));
      } catch (error) {
        this.logger.error('Skipping unreadable destination record', error, {
          action: 'destination_record_skipped',
          file: entry,
        });
      }
    }
    return configs;
  }

  async save(config: DestinationConfig): Promise<void> {
    const target = this.fileFor(config.id);
    const temp = `${target}.${randomBytes(6).toString('hex')}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, serializeDestination(config, this.secrets), 'utf8');
      await rename(temp, target);
    } catch (error) {
      await unlink(temp).catch(() => undefined);
      throw new StorageError(`Failed to write destination ${config.id}`, 'file', error);
    }
  }

  async remove(id: DestinationId): Promise<boolean> {
    try {
      await unlink(this.fileFor(id));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw new StorageError(`Failed to delete destination ${id}`, 'file', error);
    }
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
