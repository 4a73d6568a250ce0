/**
 * @webhook-relay/core - Destination Filters
 */

import type { DestinationConfig, InboundMessage } from '../types/index.js';

export type FilterRejection =
  | 'disabled'
  | 'blocked-sender'
  | 'too-short'
  | 'missing-allow-word'
  | 'deny-word';

export type FilterDecision = { pass: true } | { pass: false; reason: FilterRejection };

/**
 * Decides whether a message should be forwarded to a destination.
 *
 * Word lists match case-insensitive substrings of the message text. The
 * minimum length applies to text-only messages; an attachment is content
 * on its own.
 */
export function evaluateFilters(
  message: InboundMessage,
  destination: Pick<DestinationConfig, 'enabled' | 'filters'>,
): FilterDecision {
  if (!destination.enabled) {
    return { pass: false, reason: 'disabled' };
  }

  const { filters } = destination;

  if (filters.blockedSenderIds.includes(message.senderId)) {
    return { pass: false, reason: 'blocked-sender' };
  }

  const text = (message.text ?? '').trim();
  const lowered = text.toLowerCase();

  if (!message.media && text.length < filters.minLength) {
    return { pass: false, reason: 'too-short' };
  }

  if (filters.allowWords.length > 0 && !filters.allowWords.some((word) => lowered.includes(word))) {
    return { pass: false, reason: 'missing-allow-word' };
  }

  if (filters.denyWords.some((word) => lowered.includes(word))) {
    return { pass: false, reason: 'deny-word' };
  }

  return { pass: true };
}
