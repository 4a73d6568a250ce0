/**
 * @webhook-relay/core - Secret Codec
 *
 * At-rest encryption of webhook URLs using AES-256-GCM
 *
 * Algorithm: AES-256-GCM (AEAD)
 * - Key: 32 bytes (64 hex characters)
 * - Nonce: 12 bytes
 * - Auth Tag: 16 bytes
 *
 * Encrypted values are stored as `enc:v1:<nonce>:<tag>:<ciphertext>` (base64 parts).
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';

import { ErrorCode } from '../errors/hierarchy.js';
import { RelayError } from '../errors/relay-errors.js';

const CRYPTO_CONSTANTS = {
  NONCE_LENGTH: 12, // 96 bits (NIST SP 800-38D recommendation)
  AUTH_TAG_LENGTH: 16, // 128 bits
  KEY_LENGTH: 32, // 256 bits
  ALGORITHM: 'aes-256-gcm',
  PREFIX: 'enc:v1:',
} as const;

export class SecretCodec {
  private readonly key: Buffer;
  /** Short fingerprint of the key, safe to log */
  readonly keyId: string;

  constructor(masterKeyHex: string) {
    const key = Buffer.from(masterKeyHex, 'hex');
    if (key.length !== CRYPTO_CONSTANTS.KEY_LENGTH) {
      throw new RelayError(ErrorCode.ERR_INVALID_CONFIG, 'masterKey must be 64 hex characters');
    }
    this.key = key;
    this.keyId = createHash('sha256').update(key).digest('hex').slice(0, 16);
  }

  static isEncrypted(value: string): boolean {
    return value.startsWith(CRYPTO_CONSTANTS.PREFIX);
  }

  encrypt(plaintext: string): string {
    const nonce = randomBytes(CRYPTO_CONSTANTS.NONCE_LENGTH);
    const cipher = createCipheriv(CRYPTO_CONSTANTS.ALGORITHM, this.key, nonce, {
      authTagLength: CRYPTO_CONSTANTS.AUTH_TAG_LENGTH,
    });
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return (
      CRYPTO_CONSTANTS.PREFIX +
      [nonce.toString('base64'), tag.toString('base64'), ciphertext.toString('base64')].join(':')
    );
  }

  /**
   * @throws {RelayError} ERR_DECRYPTION_FAILED on a malformed value, wrong key or tampering
   */
  decrypt(value: string): string {
    if (!SecretCodec.isEncrypted(value)) {
      throw new RelayError(ErrorCode.ERR_DECRYPTION_FAILED, 'Value is not an encrypted secret');
    }

    const parts = value.slice(CRYPTO_CONSTANTS.PREFIX.length).split(':');
    const [nonceB64, tagB64, cipherB64] = parts;
    if (parts.length !== 3 || !nonceB64 || !tagB64 || cipherB64 === undefined) {
      throw new RelayError(ErrorCode.ERR_DECRYPTION_FAILED, 'Malformed encrypted secret');
    }

    try {
      const decipher = createDecipheriv(
        CRYPTO_CONSTANTS.ALGORITHM,
        this.key,
        Buffer.from(nonceB64, 'base64'),
        { authTagLength: CRYPTO_CONSTANTS.AUTH_TAG_LENGTH },
      );
      decipher.setAuthTag(Buffer.from(tagB64, 'base64'));
      const plaintext = Buffer.concat([
        decipher.update(Buffer.from(cipherB64, 'base64')),
        decipher.final(),
      ]);
      return plaintext.toString('utf8');
    } catch (error) {
      throw new RelayError(ErrorCode.ERR_DECRYPTION_FAILED, 'Failed to decrypt secret', {
        cause: error,
      });
    }
  }
}
