/**
 * @webhook-relay/core - Rate Limiting
 *
 * Token bucket pacing and Retry-After hold-offs for outbound webhook calls.
 */

export { TokenBucket } from './token-bucket.js';
export type { TokenBucketConfig, TokenBucketState } from './token-bucket.js';

export { DestinationRateLimiter, DEFAULT_RATE_LIMITER_CONFIG } from './rate-limiter.js';
export type { RateLimiterConfig, RateLimitStatus } from './rate-limiter.js';

export { abortableSleep, SleepAbortedError } from './sleep.js';
