/**
 * @webhook-relay/core - Shared Types
 *
 * Domain model of the relay: destinations and their watermark settings,
 * inbound messages from the source platform and the payloads delivered
 * to destination webhooks.
 */

/**
 * Destination identifier. A destination maps 1:1 to a source chat/group id.
 */
export type DestinationId = string;

/**
 * Source chat/group identifier
 */
export type ChatId = string;

export const MEDIA_KINDS = ['image', 'video', 'audio', 'document'] as const;
export type MediaKind = (typeof MEDIA_KINDS)[number];

export const WATERMARK_MODES = ['none', 'text', 'image-overlay', 'both'] as const;
export type WatermarkMode = (typeof WATERMARK_MODES)[number];

export const WATERMARK_POSITIONS = [
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
  'center',
  'custom',
] as const;
export type WatermarkPosition = (typeof WATERMARK_POSITIONS)[number];

/**
 * Text watermark. Applied to message text/captions and rendered onto images.
 */
export interface TextWatermark {
  content: string;
  prefix: string;
  suffix: string;
  /** Inserted between the source text and `content` */
  separator: string;
  position: WatermarkPosition;
  fontSize: number;
  fillColor: string;
  outlineColor: string;
  /** Outline offset in pixels; 0 disables the outline */
  outlineWidth: number;
  /** Used only when `position` is `custom` */
  offsetX: number;
  offsetY: number;
}

/**
 * Image overlay (logo) watermark
 */
export interface OverlayWatermark {
  assetPath: string;
  position: WatermarkPosition;
  /** Fraction of min(imageWidth, imageHeight), clamped to [0, 1] */
  scale: number;
  /** Alpha multiplier, clamped to [0, 1] */
  opacity: number;
  offsetX: number;
  offsetY: number;
}

/**
 * Per media class switches and the size ceiling for transformed media
 */
export interface MediaToggles {
  maxBytes: number;
  images: boolean;
  videos: boolean;
  audio: boolean;
  documents: boolean;
}

/**
 * Watermark settings, tagged by mode so that each mode carries exactly
 * the fields it needs.
 */
export type WatermarkConfig =
  | { mode: 'none'; media: MediaToggles }
  | { mode: 'text'; text: TextWatermark; media: MediaToggles }
  | { mode: 'image-overlay'; overlay: OverlayWatermark; media: MediaToggles }
  | { mode: 'both'; text: TextWatermark; overlay: OverlayWatermark; media: MediaToggles };

export interface DestinationFilters {
  /** Minimum text length; 0 disables the check */
  minLength: number;
  /** When non-empty, at least one word must appear (case-insensitive) */
  allowWords: string[];
  /** None of these words may appear (case-insensitive) */
  denyWords: string[];
  blockedSenderIds: string[];
}

/**
 * Destination configuration, stored one record per destination.
 * Records handed out by the store are frozen.
 */
export interface DestinationConfig {
  id: DestinationId;
  name: string;
  /** Webhook URL; contains the webhook token */
  targetUrl: string;
  enabled: boolean;
  filters: DestinationFilters;
  watermark: WatermarkConfig;
  /** Destination size ceiling for attachments (bytes) */
  maxMediaBytes: number;
  /** Display name override sent with each webhook message */
  username?: string;
  avatarUrl?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface MediaAttachment {
  bytes: Buffer;
  kind: MediaKind;
  filename: string;
  mimeType?: string;
}

/**
 * One event from the source platform. Never persisted.
 */
export interface InboundMessage {
  /** Unique per source chat; used for de-duplication */
  sourceMessageId: string;
  chatId: ChatId;
  senderId: string;
  senderName?: string;
  text?: string;
  media?: MediaAttachment;
}

/**
 * Content that flows through the transform engine and is delivered
 */
export interface RelayPayload {
  text?: string;
  media?: MediaAttachment;
}

/**
 * Payload as sent to a destination webhook
 */
export interface OutboundPayload extends RelayPayload {
  username?: string;
  avatarUrl?: string;
}

export type DeliveryJobState = 'pending' | 'delivered' | 'failed-permanent' | 'dropped-circuit-open';

export interface DeliveryJob {
  id: string;
  destinationId: DestinationId;
  payload: OutboundPayload;
  attempt: number;
  /** Epoch ms before which the next attempt must not start */
  nextEligibleAt: number;
  state: DeliveryJobState;
  createdAt: number;
}

export type CircuitStateName = 'closed' | 'open' | 'half-open';

export interface CircuitSnapshot {
  destinationId: DestinationId;
  state: CircuitStateName;
  consecutiveFailures: number;
  /** Epoch ms of the last transition to open */
  openedAt: number | null;
  recoveryTimeoutMs: number;
}
