/**
 * @webhook-relay/core - Attempt Classification
 *
 * Maps one webhook attempt (an HTTP status, or a transport failure) to
 * what the delivery state machine does next.
 */

import type { OutcomeVerdict } from './circuit.js';

export type AttemptClass =
  | { kind: 'delivered'; status: number }
  | { kind: 'rate-limited'; status: 429; retryAfterMs: number | null }
  | { kind: 'retryable'; status: number | null; reason: string }
  | { kind: 'permanent'; status: number | null; reason: string; countsTowardBreaker: boolean };

/** Statuses meaning the destination itself is gone or refuses us */
const DESTINATION_FAULT_STATUSES = new Set([401, 403, 404]);

export function classifyStatus(status: number, retryAfterMs: number | null = null): AttemptClass {
  if (status >= 200 && status < 300) {
    return { kind: 'delivered', status };
  }
  if (status === 429) {
    return { kind: 'rate-limited', status, retryAfterMs };
  }
  if (status === 408 || status >= 500) {
    return { kind: 'retryable', status, reason: `HTTP ${String(status)}` };
  }
  return {
    kind: 'permanent',
    status,
    reason: `HTTP ${String(status)}`,
    countsTowardBreaker: DESTINATION_FAULT_STATUSES.has(status),
  };
}

export function classifyTransportError(error: unknown): AttemptClass {
  const reason = error instanceof Error ? error.message : String(error);
  return { kind: 'retryable', status: null, reason };
}

/**
 * How an attempt moves the destination's circuit. Transport errors, 408,
 * 5xx and 401/403/404 count as failures. Rate limits and message faults
 * (400, 413) are neutral and leave the failure count untouched.
 */
export function breakerVerdict(outcome: AttemptClass): OutcomeVerdict {
  switch (outcome.kind) {
    case 'delivered':
      return 'success';
    case 'retryable':
      return 'failure';
    case 'permanent':
      return outcome.countsTowardBreaker ? 'failure' : 'neutral';
    case 'rate-limited':
      return 'neutral';
  }
}

function toSeconds(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed >= 0) return parsed;
  }
  return null;
}

/**
 * Retry hint of a 429 answer in milliseconds: the `Retry-After` header
 * (seconds), then `X-RateLimit-Reset-After`, then the JSON body's
 * `retry_after` (seconds).
 */
export function parseRetryAfter(
  headers: Record<string, unknown>,
  body: unknown,
): number | null {
  const fromHeader =
    toSeconds(headers['retry-after']) ?? toSeconds(headers['x-ratelimit-reset-after']);
  if (fromHeader !== null) {
    return Math.ceil(fromHeader * 1000);
  }

  if (typeof body === 'object' && body !== null && 'retry_after' in body) {
    const fromBody = toSeconds(body.retry_after);
    if (fromBody !== null) return Math.ceil(fromBody * 1000);
  }
  return null;
}
