/**
 * @webhook-relay/core - Destination Codec
 *
 * The single serialization boundary for DestinationConfig. Every backend
 * stores exactly what `serializeDestination` produces and reads it back
 * through `deserializeDestination`, which re-validates the record.
 */

import { ErrorCode } from '../errors/hierarchy.js';
import { ConfigValidationError, RelayError } from '../errors/relay-errors.js';
import type { DestinationConfig, WatermarkConfig } from '../types/index.js';
import { DestinationRecordSchema, toConfigIssues } from '../validation/schemas.js';
import { SecretCodec } from './secret-codec.js';

export const DESTINATION_SCHEMA_VERSION = 1;

/**
 * JSON document persisted for one destination
 */
export interface StoredDestination extends Omit<DestinationConfig, 'createdAt' | 'updatedAt'> {
  schemaVersion: number;
  createdAt: string;
  updatedAt: string;
}

export function toStoredDestination(
  config: DestinationConfig,
  secrets?: SecretCodec,
): StoredDestination {
  return {
    schemaVersion: DESTINATION_SCHEMA_VERSION,
    id: config.id,
    name: config.name,
    targetUrl: secrets ? secrets.encrypt(config.targetUrl) : config.targetUrl,
    enabled: config.enabled,
    filters: config.filters,
    watermark: config.watermark,
    maxMediaBytes: config.maxMediaBytes,
    username: config.username,
    avatarUrl: config.avatarUrl,
    createdAt: config.createdAt.toISOString(),
    updatedAt: config.updatedAt.toISOString(),
  };
}

export function serializeDestination(config: DestinationConfig, secrets?: SecretCodec): string {
  return JSON.stringify(toStoredDestination(config, secrets), null, 2);
}

/**
 * Parses and validates a stored record. Encrypted target URLs are decrypted
 * when a codec is supplied.
 *
 * @throws {ConfigValidationError} when the record does not pass validation
 * @throws {RelayError} when the JSON is malformed or the URL cannot be decrypted
 */
export function deserializeDestination(raw: string, secrets?: SecretCodec): DestinationConfig {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new RelayError(ErrorCode.ERR_INVALID_CONFIG, 'Stored destination is not valid JSON', {
      cause: error,
    });
  }

  if (isRecord(document) && typeof document.targetUrl === 'string') {
    if (SecretCodec.isEncrypted(document.targetUrl)) {
      if (!secrets) {
        throw new RelayError(
          ErrorCode.ERR_DECRYPTION_FAILED,
          'Stored destination is encrypted but no master key is configured',
        );
      }
      document = { ...document, targetUrl: secrets.decrypt(document.targetUrl) };
    }
  }

  const result = DestinationRecordSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigValidationError(toConfigIssues(result.error));
  }
  return freezeDestination(result.data);
}

/**
 * Deep-freezes a destination record so it can be shared with readers.
 */
export function freezeDestination(config: DestinationConfig): Readonly<DestinationConfig> {
  Object.freeze(config.filters.allowWords);
  Object.freeze(config.filters.denyWords);
  Object.freeze(config.filters.blockedSenderIds);
  Object.freeze(config.filters);
  freezeWatermark(config.watermark);
  return Object.freeze(config);
}

function freezeWatermark(watermark: WatermarkConfig): void {
  Object.freeze(watermark.media);
  if (watermark.mode === 'text' || watermark.mode === 'both') {
    Object.freeze(watermark.text);
  }
  if (watermark.mode === 'image-overlay' || watermark.mode === 'both') {
    Object.freeze(watermark.overlay);
  }
  Object.freeze(watermark);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
