/**
 * @webhook-relay/core - Webhook Relay Engine
 *
 * Replicates chat messages to destination webhooks:
 * - Destination config store (file, Redis or in-memory backend)
 * - Text and image watermarking (sharp)
 * - Delivery with retry, backoff with jitter and per-destination circuit breaking
 * - De-duplicating ingestion loop
 * - Dashboard stats, health and Prometheus metrics
 */

// ========== Relay ==========
export { Relay, createRelay } from './relay.js';
export type { RelayOptions, UpsertOptions } from './relay.js';

// ========== Types ==========
export type {
  ChatId,
  CircuitSnapshot,
  CircuitStateName,
  DeliveryJob,
  DeliveryJobState,
  DestinationConfig,
  DestinationFilters,
  DestinationId,
  InboundMessage,
  MediaAttachment,
  MediaKind,
  MediaToggles,
  OutboundPayload,
  OverlayWatermark,
  RelayPayload,
  TextWatermark,
  WatermarkConfig,
  WatermarkMode,
  WatermarkPosition,
} from './types/index.js';
export { MEDIA_KINDS, WATERMARK_MODES, WATERMARK_POSITIONS } from './types/index.js';
export type {
  CircuitBreakerConfig,
  DedupConfig,
  DeliveryConfig,
  RelayConfig,
  RelayEnvironment,
  StorageConfig,
  TransformConfig,
  ValidatorConfig,
} from './types/config.js';

// ========== Configuration ==========
export {
  DEVELOPMENT,
  PRODUCTION,
  TESTING,
  PRESETS,
  createRelayConfigFromPreset,
  getPreset,
  isPresetName,
  validatePreset,
} from './config/presets.js';
export type { ConfigPreset, PresetName, RelayConfigOverrides } from './config/presets.js';
export { loadDotenvFile, loadRelayConfigFromEnv, loadDestinationsFromEnv } from './config/env.js';

// ========== Validation ==========
export {
  DEFAULT_MAX_MEDIA_BYTES,
  DestinationInputSchema,
  RelayConfigSchema,
  WatermarkConfigSchema,
  WEBHOOK_URL_PATTERN,
  isWebhookUrl,
  parseDestinationInput,
  parseRelayConfig,
} from './validation/schemas.js';
export type { DestinationInput } from './validation/schemas.js';

// ========== Errors ==========
export * from './errors/index.js';

// ========== Components ==========
export * from './destinations/index.js';
export * from './watermark/index.js';
export * from './delivery/index.js';
export * from './validator/index.js';
export * from './ingestion/index.js';
export * from './health/index.js';
export * from './rate-limit/index.js';

export { StatsAggregator } from './stats/aggregator.js';
export type { DestinationStatsView, ErrorStage, StatsView } from './stats/aggregator.js';

// ========== Observability ==========
export {
  ConsoleStructuredLogger,
  NullLogger,
  LogLevel,
  redactWebhookTokens,
  sanitizeLogContext,
} from './logger/index.js';
export type { LogContext, StructuredLogger, LoggerEnvironment } from './logger/index.js';
export { withContext, getContext, getCorrelationId } from './context/execution-context.js';
export type { ExecutionContext } from './context/execution-context.js';
export { metricsRegistry, getMetricsText, resetMetrics } from './metrics/index.js';
