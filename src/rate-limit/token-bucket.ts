/**
 * @webhook-relay/core - Token Bucket
 *
 * Paces outbound webhook calls for one destination. Tokens refill at a
 * fixed rate up to the burst capacity and one token is taken per call.
 *
 * @see https://en.wikipedia.org/wiki/Token_bucket
 */

import { abortableSleep } from './sleep.js';

export interface TokenBucketConfig {
  /** Burst capacity */
  maxTokens: number;
  /** Tokens added per second */
  refillRate: number;
  /** Initial number of tokens (defaults to maxTokens) */
  initialTokens?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export interface TokenBucketState {
  tokens: number;
  lastRefill: number;
  maxTokens: number;
  refillRate: number;
}

/**
 * @example
 * ```typescript
 * // 5 calls per 2 seconds, burst of 5
 * const bucket = new TokenBucket({ maxTokens: 5, refillRate: 5 / 2 });
 * await bucket.acquire();
 * ```
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;
  private readonly now: () => number;

  constructor(config: TokenBucketConfig) {
    if (config.maxTokens <= 0 || config.refillRate <= 0) {
      throw new Error('Token bucket capacity and refill rate must be positive');
    }
    this.maxTokens = config.maxTokens;
    this.refillRate = config.refillRate;
    this.now = config.now ?? Date.now;
    this.tokens = Math.min(config.initialTokens ?? config.maxTokens, config.maxTokens);
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  private assertCount(count: number): void {
    if (count <= 0) {
      throw new Error('Token count must be positive');
    }
    if (count > this.maxTokens) {
      throw new Error(
        `Cannot acquire ${String(count)} tokens; max capacity is ${String(this.maxTokens)}`,
      );
    }
  }

  /**
   * @returns true if tokens were taken
   */
  tryAcquire(count = 1): boolean {
    this.assertCount(count);
    this.refill();

    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }
    return false;
  }

  /**
   * Waits until `count` tokens are available, then takes them.
   */
  async acquire(count = 1, signal?: AbortSignal): Promise<void> {
    this.assertCount(count);

    while (!this.tryAcquire(count)) {
      if (signal?.aborted) {
        throw new Error('Token acquisition aborted');
      }
      await abortableSleep(Math.max(1, Math.min(this.getWaitTime(count), 100)), signal);
    }
  }

  getAvailableTokens(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * @returns milliseconds until `count` tokens are available, 0 if they are now
   */
  getWaitTime(count = 1): number {
    this.refill();
    if (this.tokens >= count) {
      return 0;
    }
    return Math.ceil(((count - this.tokens) / this.refillRate) * 1000);
  }

  getState(): TokenBucketState {
    this.refill();
    return {
      tokens: this.tokens,
      lastRefill: this.lastRefill,
      maxTokens: this.maxTokens,
      refillRate: this.refillRate,
    };
  }

  reset(): void {
    this.tokens = this.maxTokens;
    this.lastRefill = this.now();
  }
}
