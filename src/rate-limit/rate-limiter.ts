/**
 * @webhook-relay/core - Destination Rate Limiter
 *
 * Per-destination pacing of outbound webhook calls:
 * - a token bucket of `requestsPerWindow` tokens refilled over `windowMs`
 * - a hold-off set from a destination's Retry-After answer, honoured by
 *   every later call to that destination
 */

import { LRUCache } from 'lru-cache';

import type { DestinationId } from '../types/index.js';

import { abortableSleep } from './sleep.js';
import { TokenBucket } from './token-bucket.js';

export interface RateLimiterConfig {
  /** Calls allowed per window (also the burst capacity) */
  requestsPerWindow: number;
  windowMs: number;
  /** Destinations tracked before the least recently used is forgotten */
  maxDestinations?: number;
  enabled: boolean;
  now?: () => number;
}

export interface RateLimitStatus {
  /** Time spent waiting for a token or a hold-off (ms) */
  waitTimeMs: number;
  tokensRemaining: number;
  /** Whether a Retry-After hold-off delayed this call */
  heldOff: boolean;
}

/** 5 calls per 2 seconds per webhook */
export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  requestsPerWindow: 5,
  windowMs: 2000,
  maxDestinations: 10000,
  enabled: true,
};

/**
 * @example
 * ```typescript
 * const limiter = new DestinationRateLimiter({ requestsPerWindow: 5, windowMs: 2000 });
 * await limiter.acquire(destinationId);
 * await sendWebhook();
 * ```
 */
export class DestinationRateLimiter {
  private readonly buckets: LRUCache<DestinationId, TokenBucket>;
  /** Epoch ms before which no call may start, per destination */
  private readonly holdOffs: LRUCache<DestinationId, number>;
  private readonly config: RateLimiterConfig;
  private readonly now: () => number;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config };
    this.now = this.config.now ?? Date.now;

    const max = this.config.maxDestinations ?? 10000;
    this.buckets = new LRUCache<DestinationId, TokenBucket>({ max, ttl: 60 * 60 * 1000 });
    this.holdOffs = new LRUCache<DestinationId, number>({ max });
  }

  private getOrCreateBucket(destinationId: DestinationId): TokenBucket {
    let bucket = this.buckets.get(destinationId);
    if (!bucket) {
      bucket = new TokenBucket({
        maxTokens: this.config.requestsPerWindow,
        refillRate: this.config.requestsPerWindow / (this.config.windowMs / 1000),
        now: this.now,
      });
      this.buckets.set(destinationId, bucket);
    }
    return bucket;
  }

  /**
   * Waits out any hold-off, then takes a token for one call.
   */
  async acquire(destinationId: DestinationId, signal?: AbortSignal): Promise<RateLimitStatus> {
    if (!this.config.enabled) {
      return { waitTimeMs: 0, tokensRemaining: this.config.requestsPerWindow, heldOff: false };
    }

    const started = this.now();
    let heldOff = false;

    let holdOffMs = this.getHoldOff(destinationId);
    while (holdOffMs > 0) {
      heldOff = true;
      await abortableSleep(holdOffMs, signal);
      holdOffMs = this.getHoldOff(destinationId);
    }

    const bucket = this.getOrCreateBucket(destinationId);
    await bucket.acquire(1, signal);

    return {
      waitTimeMs: Math.max(0, this.now() - started),
      tokensRemaining: bucket.getAvailableTokens(),
      heldOff,
    };
  }

  /**
   * Delays later calls to a destination by `delayMs`. A shorter hold-off
   * never replaces a longer one.
   */
  holdOff(destinationId: DestinationId, delayMs: number): void {
    const until = this.now() + Math.max(0, delayMs);
    const current = this.holdOffs.get(destinationId) ?? 0;
    if (until > current) {
      this.holdOffs.set(destinationId, until);
    }
  }

  /**
   * @returns milliseconds left in the destination's hold-off, 0 when none
   */
  getHoldOff(destinationId: DestinationId): number {
    const until = this.holdOffs.get(destinationId);
    if (until === undefined) return 0;
    const remaining = until - this.now();
    if (remaining <= 0) {
      this.holdOffs.delete(destinationId);
      return 0;
    }
    return remaining;
  }

  reset(destinationId: DestinationId): void {
    this.buckets.delete(destinationId);
    this.holdOffs.delete(destinationId);
  }

  clear(): void {
    this.buckets.clear();
    this.holdOffs.clear();
  }

  getConfig(): Readonly<RateLimiterConfig> {
    return { ...this.config };
  }

  getStats(): { trackedDestinations: number; heldOff: number } {
    let heldOff = 0;
    for (const id of [...this.holdOffs.keys()]) {
      if (this.getHoldOff(id) > 0) heldOff++;
    }
    return { trackedDestinations: this.buckets.size, heldOff };
  }
}
