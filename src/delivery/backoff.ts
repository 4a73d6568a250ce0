/**
 * @webhook-relay/core - Retry Backoff
 */

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter factor in [0, 1] */
  jitter: number;
}

/**
 * Delay before retry number `attempt` (1-based: the wait after the first
 * failed attempt is `attempt = 1`).
 *
 * `min(max, base * 2^(attempt-1))`, scaled by `1 + jitter * (2r - 1)` and
 * capped at `max` again.
 */
export function computeBackoff(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  const factor = 1 + policy.jitter * (2 * random() - 1);
  return Math.max(0, Math.min(policy.maxDelayMs, Math.round(base * factor)));
}
