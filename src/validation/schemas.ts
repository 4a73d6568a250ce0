/**
 * @webhook-relay/core - Zod Validation Schemas
 *
 * Schemas for runtime validation of relay configuration and destination
 * records. Every destination enters the store through these schemas.
 */

import { z } from 'zod';

import { ErrorCode } from '../errors/hierarchy.js';
import { ConfigValidationError, type ConfigIssue } from '../errors/relay-errors.js';
import type {
  CircuitBreakerConfig,
  DedupConfig,
  DeliveryConfig,
  RelayConfig,
  StorageConfig,
  TransformConfig,
  ValidatorConfig,
} from '../types/config.js';
import {
  WATERMARK_POSITIONS,
  type DestinationConfig,
  type DestinationFilters,
  type MediaToggles,
  type OverlayWatermark,
  type TextWatermark,
  type WatermarkConfig,
} from '../types/index.js';

/** Attachment ceiling accepted by Discord-style webhooks (25 MiB) */
export const DEFAULT_MAX_MEDIA_BYTES = 25 * 1024 * 1024;

/**
 * Webhook URL shape: `https://discord.com/api/webhooks/<id>/<token>`,
 * also accepted on discordapp.com, the ptb/canary hosts and versioned API paths.
 */
export const WEBHOOK_URL_PATTERN =
  /^https:\/\/(?:(?:ptb|canary)\.)?discord(?:app)?\.com\/api\/(?:v\d+\/)?webhooks\/\d+\/[\w-]+\/?$/;

export function isWebhookUrl(url: string): boolean {
  return WEBHOOK_URL_PATTERN.test(url.trim());
}

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Destination id, also used as a file name and a Redis key suffix
 */
export const DestinationIdSchema = z
  .string()
  .trim()
  .min(1, 'id is required')
  .max(128, 'id should not exceed 128 characters')
  .regex(/^[\w@.:+-]+$/, 'id may only contain letters, digits and _ @ . : + -')
  .describe('Destination id (the source chat/group id)');

const positionSchema = z.enum(WATERMARK_POSITIONS, {
  errorMap: () => ({
    message: `position must be one of ${WATERMARK_POSITIONS.join(', ')}`,
  }),
});

const offsetSchema = z.number().int('offset must be an integer').default(0);

/**
 * Text Watermark Schema
 */
export const TextWatermarkSchema = z
  .object({
    content: z.string().default('').describe('Text appended to messages and drawn on images'),
    prefix: z.string().default(''),
    suffix: z.string().default(''),
    separator: z.string().default(' '),
    position: positionSchema.default('bottom-right'),
    fontSize: z
      .number()
      .int()
      .min(6, 'fontSize must be at least 6')
      .max(512, 'fontSize should not exceed 512')
      .default(36),
    fillColor: z.string().regex(HEX_COLOR, 'fillColor must be a hex color').default('#FFFFFF'),
    outlineColor: z
      .string()
      .regex(HEX_COLOR, 'outlineColor must be a hex color')
      .default('#000000'),
    outlineWidth: z
      .number()
      .int()
      .min(0, 'outlineWidth must be non-negative')
      .max(20, 'outlineWidth should not exceed 20')
      .default(2),
    offsetX: offsetSchema,
    offsetY: offsetSchema,
  })
  .describe('Text watermark') satisfies z.ZodType<TextWatermark, z.ZodTypeDef, unknown>;

/**
 * Overlay Watermark Schema. Scale and opacity are clamped, not rejected.
 */
export const OverlayWatermarkSchema = z
  .object({
    assetPath: z.string().trim().min(1, 'assetPath is required'),
    position: positionSchema.default('bottom-right'),
    scale: z.number().finite('scale must be finite').default(0.2).transform(clampUnit),
    opacity: z.number().finite('opacity must be finite').default(0.7).transform(clampUnit),
    offsetX: offsetSchema,
    offsetY: offsetSchema,
  })
  .describe('Image overlay watermark') satisfies z.ZodType<
  OverlayWatermark,
  z.ZodTypeDef,
  unknown
>;

export const MediaTogglesSchema = z.object({
  maxBytes: z
    .number()
    .int()
    .positive('maxBytes must be positive')
    .default(DEFAULT_MAX_MEDIA_BYTES)
    .describe('Size ceiling for transformed media (bytes)'),
  images: z.boolean().default(true),
  videos: z.boolean().default(true),
  audio: z.boolean().default(true),
  documents: z.boolean().default(true),
}) satisfies z.ZodType<MediaToggles, z.ZodTypeDef, unknown>;

const mediaField = MediaTogglesSchema.default({});

/**
 * Watermark Configuration Schema, discriminated by `mode`
 */
export const WatermarkConfigSchema = z.discriminatedUnion(
  'mode',
  [
    z.object({ mode: z.literal('none'), media: mediaField }),
    z.object({ mode: z.literal('text'), text: TextWatermarkSchema, media: mediaField }),
    z.object({
      mode: z.literal('image-overlay'),
      overlay: OverlayWatermarkSchema,
      media: mediaField,
    }),
    z.object({
      mode: z.literal('both'),
      text: TextWatermarkSchema,
      overlay: OverlayWatermarkSchema,
      media: mediaField,
    }),
  ],
  {
    errorMap: () => ({ message: 'mode must be one of none, text, image-overlay, both' }),
  },
) satisfies z.ZodType<WatermarkConfig, z.ZodTypeDef, unknown>;

const wordList = z
  .array(z.string().trim().min(1, 'words must not be empty').toLowerCase())
  .default([]);

export const DestinationFiltersSchema = z.object({
  minLength: z.number().int().min(0, 'minLength must be non-negative').default(0),
  allowWords: wordList,
  denyWords: wordList,
  blockedSenderIds: z.array(z.string().min(1)).default([]),
}) satisfies z.ZodType<DestinationFilters, z.ZodTypeDef, unknown>;

const destinationShape = {
  id: DestinationIdSchema,
  name: z.string().trim().min(1).max(100).optional(),
  targetUrl: z
    .string({ required_error: 'targetUrl is required' })
    .trim()
    .refine(isWebhookUrl, {
      message: 'targetUrl must look like https://discord.com/api/webhooks/<id>/<token>',
    })
    .describe('Destination webhook URL'),
  enabled: z.boolean().default(true),
  filters: DestinationFiltersSchema.default({}),
  watermark: WatermarkConfigSchema.default({ mode: 'none' }),
  maxMediaBytes: z
    .number()
    .int()
    .positive('maxMediaBytes must be positive')
    .default(DEFAULT_MAX_MEDIA_BYTES),
  username: z.string().trim().min(1).max(80).optional(),
  avatarUrl: z.string().url('avatarUrl must be a URL').optional(),
};

/**
 * Destination Input Schema, used by upsert
 */
export const DestinationInputSchema = z.object(destinationShape);

export type DestinationInput = z.input<typeof DestinationInputSchema>;
export type ParsedDestinationInput = z.output<typeof DestinationInputSchema>;

/**
 * Stored Destination Record Schema, used when reading durable storage
 */
export const DestinationRecordSchema = z.object({
  ...destinationShape,
  name: z.string().min(1),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
}) satisfies z.ZodType<DestinationConfig, z.ZodTypeDef, unknown>;

/**
 * Converts zod issues into field-named configuration issues
 */
export function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validates and normalizes destination input.
 *
 * @throws {ConfigValidationError} naming the offending field
 */
export function parseDestinationInput(input: unknown): ParsedDestinationInput {
  const result = DestinationInputSchema.safeParse(input);
  if (!result.success) {
    const issues = toConfigIssues(result.error);
    const code =
      issues[0]?.field === 'targetUrl'
        ? ErrorCode.ERR_INVALID_WEBHOOK_URL
        : ErrorCode.ERR_INVALID_CONFIG;
    throw new ConfigValidationError(issues, code);
  }
  return result.data;
}

/**
 * Delivery Configuration Schema
 */
export const DeliveryConfigSchema = z
  .object({
    maxConcurrency: z
      .number()
      .int()
      .min(1, 'maxConcurrency must be at least 1')
      .max(64, 'maxConcurrency should not exceed 64')
      .describe('Concurrent outbound webhook calls'),
    queueSize: z
      .number()
      .int()
      .min(1, 'queueSize must be at least 1')
      .max(100000, 'queueSize should not exceed 100000')
      .describe('Jobs admitted before backpressure drops'),
    maxAttempts: z
      .number()
      .int()
      .min(1, 'maxAttempts must be at least 1')
      .max(20, 'maxAttempts should not exceed 20'),
    baseDelayMs: z.number().int().min(0, 'baseDelayMs must be non-negative'),
    maxDelayMs: z.number().int().min(0, 'maxDelayMs must be non-negative'),
    jitter: z.number().min(0, 'jitter must be in [0, 1]').max(1, 'jitter must be in [0, 1]'),
    requestTimeoutMs: z
      .number()
      .int()
      .min(100, 'requestTimeoutMs must be at least 100ms')
      .max(120000, 'requestTimeoutMs should not exceed 120s'),
    requestsPerWindow: z.number().int().min(1, 'requestsPerWindow must be at least 1'),
    rateWindowMs: z.number().int().min(1, 'rateWindowMs must be positive'),
  })
  .refine((data) => data.maxDelayMs >= data.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  }) satisfies z.ZodType<DeliveryConfig, z.ZodTypeDef, unknown>;

export const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().min(1, 'failureThreshold must be at least 1'),
  recoveryTimeoutMs: z.number().int().min(1, 'recoveryTimeoutMs must be positive'),
}) satisfies z.ZodType<CircuitBreakerConfig, z.ZodTypeDef, unknown>;

export const DedupConfigSchema = z.object({
  windowSize: z.number().int().min(1, 'windowSize must be at least 1'),
  ttlMs: z.number().int().min(0, 'ttlMs must be non-negative'),
  maxChats: z.number().int().min(1, 'maxChats must be at least 1'),
}) satisfies z.ZodType<DedupConfig, z.ZodTypeDef, unknown>;

export const ValidatorConfigSchema = z.object({
  timeoutMs: z.number().int().min(100, 'timeoutMs must be at least 100ms'),
  acceptedStatus: z.number().int().min(200).max(299),
  probeContent: z.string().min(1),
  probeUsername: z.string().min(1),
}) satisfies z.ZodType<ValidatorConfig, z.ZodTypeDef, unknown>;

export const TransformConfigSchema = z
  .object({
    overlayCacheSize: z.number().int().min(1),
    margin: z.number().int().min(0),
    baselineQuality: z.number().int().min(1).max(100),
    minQuality: z.number().int().min(1).max(100),
    qualityStep: z.number().int().min(1).max(50),
    maxWidth: z.number().int().min(16),
    maxHeight: z.number().int().min(16),
  })
  .refine((data) => data.minQuality <= data.baselineQuality, {
    message: 'minQuality must not exceed baselineQuality',
    path: ['minQuality'],
  }) satisfies z.ZodType<TransformConfig, z.ZodTypeDef, unknown>;

export const StorageConfigSchema = z
  .object({
    backend: z.enum(['file', 'redis', 'memory'], {
      errorMap: () => ({ message: 'backend must be "file", "redis", or "memory"' }),
    }),
    directory: z.string().min(1, 'directory is required'),
    redisUrl: z.string().optional(),
    keyPrefix: z.string().min(1),
    masterKey: z
      .string()
      .regex(/^[0-9a-fA-F]{64}$/, 'masterKey must be 64 hex characters')
      .optional(),
  })
  .refine((data) => data.backend !== 'redis' || !!data.redisUrl, {
    message: 'redisUrl is required when backend is "redis"',
    path: ['redisUrl'],
  }) satisfies z.ZodType<StorageConfig, z.ZodTypeDef, unknown>;

/**
 * Relay Configuration Schema
 */
export const RelayConfigSchema = z.object({
  environment: z.enum(['development', 'production', 'test'], {
    errorMap: () => ({ message: 'environment must be "development", "production", or "test"' }),
  }),
  delivery: DeliveryConfigSchema,
  circuitBreaker: CircuitBreakerConfigSchema,
  dedup: DedupConfigSchema,
  validator: ValidatorConfigSchema,
  transform: TransformConfigSchema,
  storage: StorageConfigSchema,
}) satisfies z.ZodType<RelayConfig, z.ZodTypeDef, unknown>;

/**
 * Validates a complete relay configuration.
 *
 * @throws {ConfigValidationError}
 */
export function parseRelayConfig(config: unknown): RelayConfig {
  const result = RelayConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(toConfigIssues(result.error));
  }
  return result.data;
}
