/**
 * @webhook-relay/core - Error Classes
 */

import { ErrorCode, getErrorMetadata, type ErrorMetadata } from './hierarchy.js';

export class RelayError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RelayError';
  }

  get metadata(): ErrorMetadata {
    return getErrorMetadata(this.code);
  }
}

export interface ConfigIssue {
  /** Dotted path of the offending field, e.g. `watermark.overlay.scale` */
  field: string;
  message: string;
}

/**
 * Raised when a destination or relay configuration is rejected.
 * `field` names the first offending field; `issues` lists all of them.
 */
export class ConfigValidationError extends RelayError {
  public readonly field: string;

  constructor(
    public readonly issues: ConfigIssue[],
    code: ErrorCode = ErrorCode.ERR_INVALID_CONFIG,
  ) {
    const first = issues[0] ?? { field: '', message: 'invalid configuration' };
    super(code, `Invalid ${first.field || 'configuration'}: ${first.message}`);
    this.name = 'ConfigValidationError';
    this.field = first.field;
  }
}

export class DestinationNotFoundError extends RelayError {
  constructor(public readonly destinationId: string) {
    super(ErrorCode.ERR_DESTINATION_NOT_FOUND, `Destination not found: ${destinationId}`);
    this.name = 'DestinationNotFoundError';
  }
}

export class StorageError extends RelayError {
  constructor(
    message: string,
    public readonly layer: 'file' | 'redis' | 'memory',
    cause?: unknown,
  ) {
    super(layer === 'redis' ? ErrorCode.ERR_STORAGE_REDIS : ErrorCode.ERR_STORAGE_FILE, message, {
      cause,
    });
    this.name = 'StorageError';
  }
}

export class StartupError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.ERR_STARTUP_FAILED, message, { cause });
    this.name = 'StartupError';
  }
}
