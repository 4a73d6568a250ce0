/**
 * @webhook-relay/core - Overlay Asset Cache
 *
 * Read-through LRU cache of decoded overlay images keyed by path.
 * Concurrent lookups of the same path share a single load.
 */

import { readFile } from 'fs/promises';
import { LRUCache } from 'lru-cache';
import sharp from 'sharp';

import { ErrorCode } from '../errors/hierarchy.js';
import { RelayError } from '../errors/relay-errors.js';

export interface OverlayAsset {
  /** RGBA PNG */
  buffer: Buffer;
  width: number;
  height: number;
}

export interface OverlayCacheOptions {
  /** Assets kept in memory (default: 32) */
  max?: number;
  /** Reads the raw asset bytes (default: fs readFile) */
  readAsset?: (path: string) => Promise<Buffer>;
}

export class OverlayCache {
  private readonly cache: LRUCache<string, OverlayAsset>;
  private readonly readAsset: (path: string) => Promise<Buffer>;
  private loads = 0;

  constructor(options: OverlayCacheOptions = {}) {
    this.readAsset = options.readAsset ?? ((path) => readFile(path));
    this.cache = new LRUCache<string, OverlayAsset>({
      max: options.max ?? 32,
      fetchMethod: async (path) => {
        this.loads++;
        return await this.decode(path);
      },
    });
  }

  /**
   * @throws {RelayError} ERR_OVERLAY_UNAVAILABLE when the asset cannot be read or decoded
   */
  async get(path: string): Promise<OverlayAsset> {
    let asset: OverlayAsset | undefined;
    try {
      asset = await this.cache.fetch(path);
    } catch (error) {
      throw new RelayError(ErrorCode.ERR_OVERLAY_UNAVAILABLE, `Overlay asset unavailable: ${path}`, {
        cause: error,
      });
    }
    if (!asset) {
      throw new RelayError(ErrorCode.ERR_OVERLAY_UNAVAILABLE, `Overlay asset unavailable: ${path}`);
    }
    return asset;
  }

  /** Number of times an asset was read from its source */
  get loadCount(): number {
    return this.loads;
  }

  get size(): number {
    return this.cache.size;
  }

  invalidate(path: string): void {
    this.cache.delete(path);
  }

  clear(): void {
    this.cache.clear();
  }

  private async decode(path: string): Promise<OverlayAsset> {
    const raw = await this.readAsset(path);
    const { data, info } = await sharp(raw)
      .ensureAlpha()
      .png()
      .toBuffer({ resolveWithObject: true });

    return { buffer: data, width: info.width, height: info.height };
  }
}
