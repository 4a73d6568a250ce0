/**
 * @webhook-relay/core - File Destination Backend Tests
 */

import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { FileDestinationBackend } from '../../destinations/file-backend.js';
import { SecretCodec } from '../../destinations/secret-codec.js';
import { StorageError } from '../../errors/relay-errors.js';
import type { StructuredLogger } from '../../logger/index.js';
import type { DestinationConfig } from '../../types/index.js';
import { parseDestinationInput } from '../../validation/schemas.js';

const WEBHOOK = 'https://discord.com/api/webhooks/1001/test-token';

function makeDestination(id: string): DestinationConfig {
  return {
    ...parseDestinationInput({ id, targetUrl: WEBHOOK }),
    name: id,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
  };
}

function createLogger(): StructuredLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('FileDestinationBackend', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'relay-destinations-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should write one JSON file per destination', async () => {
    const backend = new FileDestinationBackend({ directory });

    await backend.save(makeDestination('-1001'));

    expect(await readdir(directory)).toEqual(['destination_-1001.json']);
    const document: unknown = JSON.parse(await readFile(backend.fileFor('-1001'), 'utf8'));
    expect(document).toMatchObject({ schemaVersion: 1, id: '-1001', targetUrl: WEBHOOK });
  });

  it('should load saved destinations', async () => {
    const backend = new FileDestinationBackend({ directory });
    await backend.save(makeDestination('b'));
    await backend.save(makeDestination('a'));

    const loaded = await backend.loadAll();

    expect(loaded.map((config) => config.id)).toEqual(['a', 'b']);
  });

  it('should return no records for a missing directory', async () => {
    const backend = new FileDestinationBackend({ directory: join(directory, 'missing') });

    expect(await backend.loadAll()).toEqual([]);
  });

  it('should create the directory on first save', async () => {
    const nested = join(directory, 'nested', 'dir');
    const backend = new FileDestinationBackend({ directory: nested });

    await backend.save(makeDestination('-1001'));

    expect(await readdir(nested)).toEqual(['destination_-1001.json']);
  });

  it('should skip unreadable records and log them', async () => {
    const logger = createLogger();
    const backend = new FileDestinationBackend({ directory, logger });
    await backend.save(makeDestination('good'));
    await writeFile(join(directory, 'destination_bad.json'), '{broken', 'utf8');
    await writeFile(join(directory, 'notes.txt'), 'ignored', 'utf8');

    const loaded = await backend.loadAll();

    expect(loaded.map((config) => config.id)).toEqual(['good']);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should encrypt target URLs at rest', async () => {
    const secrets = new SecretCodec('c'.repeat(64));
    const backend = new FileDestinationBackend({ directory, secrets });

    await backend.save(makeDestination('-1001'));

    const raw = await readFile(backend.fileFor('-1001'), 'utf8');
    expect(raw).not.toContain('test-token');
    const [loaded] = await backend.loadAll();
    expect(loaded?.targetUrl).toBe(WEBHOOK);
  });

  it('should remove a destination file', async () => {
    const backend = new FileDestinationBackend({ directory });
    await backend.save(makeDestination('-1001'));

    expect(await backend.remove('-1001')).toBe(true);
    expect(await backend.remove('-1001')).toBe(false);
    expect(await readdir(directory)).toEqual([]);
  });

  it('should raise StorageError when the directory cannot be created', async () => {
    const blocker = join(directory, 'blocker');
    await writeFile(blocker, 'file in the way', 'utf8');
    const backend = new FileDestinationBackend({ directory: join(blocker, 'sub') });

    await expect(backend.save(makeDestination('-1001'))).rejects.toBeInstanceOf(StorageError);
  });
});
