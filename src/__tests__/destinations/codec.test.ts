/**
 * @webhook-relay/core - Destination Codec and Secret Codec Tests
 */

import { describe, it, expect } from 'vitest';

import {
  DESTINATION_SCHEMA_VERSION,
  deserializeDestination,
  serializeDestination,
  toStoredDestination,
} from '../../destinations/codec.js';
import { SecretCodec } from '../../destinations/secret-codec.js';
import { ErrorCode } from '../../errors/hierarchy.js';
import { ConfigValidationError, RelayError } from '../../errors/relay-errors.js';
import type { DestinationConfig } from '../../types/index.js';
import { parseDestinationInput } from '../../validation/schemas.js';

const MASTER_KEY = 'a'.repeat(64);
const OTHER_KEY = 'b'.repeat(64);
const WEBHOOK = 'https://discord.com/api/webhooks/1001/test-token';

function makeDestination(): DestinationConfig {
  const parsed = parseDestinationInput({
    id: '-1001',
    targetUrl: WEBHOOK,
    watermark: { mode: 'text', text: { content: '[relayed]' } },
  });
  return {
    ...parsed,
    name: 'News',
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-02T00:00:00.000Z'),
  };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('SecretCodec', () => {
  it('should encrypt and decrypt a webhook URL', () => {
    const codec = new SecretCodec(MASTER_KEY);

    const encrypted = codec.encrypt(WEBHOOK);

    expect(encrypted.startsWith('enc:v1:')).toBe(true);
    expect(encrypted).not.toContain('test-token');
    expect(codec.decrypt(encrypted)).toBe(WEBHOOK);
  });

  it('should use a fresh nonce for every encryption', () => {
    const codec = new SecretCodec(MASTER_KEY);

    expect(codec.encrypt(WEBHOOK)).not.toBe(codec.encrypt(WEBHOOK));
  });

  it('should reject a key of the wrong length', () => {
    expect(() => new SecretCodec('abcd')).toThrow('masterKey must be 64 hex characters');
  });

  it('should fail with ERR_DECRYPTION_FAILED under another key', () => {
    const encrypted = new SecretCodec(MASTER_KEY).encrypt(WEBHOOK);

    const error = captureError(() => new SecretCodec(OTHER_KEY).decrypt(encrypted));

    expect(error).toBeInstanceOf(RelayError);
    expect(error).toMatchObject({ code: ErrorCode.ERR_DECRYPTION_FAILED });
  });

  it('should reject malformed values', () => {
    const codec = new SecretCodec(MASTER_KEY);

    expect(() => codec.decrypt('plain')).toThrow('Value is not an encrypted secret');
    expect(() => codec.decrypt('enc:v1:abc')).toThrow('Malformed encrypted secret');
  });

  it('should expose a stable key fingerprint', () => {
    expect(new SecretCodec(MASTER_KEY).keyId).toBe(new SecretCodec(MASTER_KEY).keyId);
    expect(new SecretCodec(MASTER_KEY).keyId).toHaveLength(16);
  });
});

describe('Destination codec', () => {
  it('should write the schema version and ISO dates', () => {
    const stored = toStoredDestination(makeDestination());

    expect(stored.schemaVersion).toBe(DESTINATION_SCHEMA_VERSION);
    expect(stored.createdAt).toBe('2026-01-01T00:00:00.000Z');
    expect(stored.updatedAt).toBe('2026-01-02T00:00:00.000Z');
  });

  it('should read back what it writes', () => {
    const original = makeDestination();

    const restored = deserializeDestination(serializeDestination(original));

    expect(restored).toEqual(original);
    expect(Object.isFrozen(restored)).toBe(true);
  });

  it('should encrypt the target URL when a codec is given', () => {
    const secrets = new SecretCodec(MASTER_KEY);

    const raw = serializeDestination(makeDestination(), secrets);

    expect(raw).not.toContain('test-token');
    expect(deserializeDestination(raw, secrets).targetUrl).toBe(WEBHOOK);
  });

  it('should refuse an encrypted record without a master key', () => {
    const raw = serializeDestination(makeDestination(), new SecretCodec(MASTER_KEY));

    const error = captureError(() => deserializeDestination(raw));

    expect(error).toMatchObject({ code: ErrorCode.ERR_DECRYPTION_FAILED });
  });

  it('should reject malformed JSON', () => {
    const error = captureError(() => deserializeDestination('{not json'));

    expect(error).toMatchObject({
      code: ErrorCode.ERR_INVALID_CONFIG,
      message: 'Stored destination is not valid JSON',
    });
  });

  it('should re-validate stored records', () => {
    const stored = { ...toStoredDestination(makeDestination()), maxMediaBytes: -5 };

    const error = captureError(() => deserializeDestination(JSON.stringify(stored)));

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ field: 'maxMediaBytes' });
  });
});
