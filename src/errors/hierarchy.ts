/**
 * Error Hierarchy - Centralized error classification system
 *
 * This module defines the error taxonomy for the relay engine,
 * including error codes, domains, severity levels, and metadata.
 */

export enum ErrorDomain {
  CONFIGURATION = 'CONFIGURATION',
  DELIVERY = 'DELIVERY',
  TRANSFORM = 'TRANSFORM',
  RESILIENCE = 'RESILIENCE',
  INGESTION = 'INGESTION',
}

export enum ErrorSeverity {
  RECOVERABLE = 'recoverable', // retry may succeed
  DEGRADED = 'degraded', // system keeps working with reduced function
  CRITICAL = 'critical', // component cannot continue
}

export enum ErrorCode {
  // Configuration errors (CONFIGURATION domain)
  ERR_INVALID_CONFIG = 'ERR_INVALID_CONFIG',
  ERR_INVALID_WEBHOOK_URL = 'ERR_INVALID_WEBHOOK_URL',
  ERR_WEBHOOK_PROBE_FAILED = 'ERR_WEBHOOK_PROBE_FAILED',
  ERR_DESTINATION_NOT_FOUND = 'ERR_DESTINATION_NOT_FOUND',
  ERR_STORAGE_FILE = 'ERR_STORAGE_FILE',
  ERR_STORAGE_REDIS = 'ERR_STORAGE_REDIS',
  ERR_DECRYPTION_FAILED = 'ERR_DECRYPTION_FAILED',

  // Delivery errors (DELIVERY domain)
  ERR_DELIVERY_TRANSIENT = 'ERR_DELIVERY_TRANSIENT',
  ERR_DELIVERY_PERMANENT = 'ERR_DELIVERY_PERMANENT',
  ERR_RATE_LIMITED = 'ERR_RATE_LIMITED',
  ERR_PAYLOAD_TOO_LARGE = 'ERR_PAYLOAD_TOO_LARGE',

  // Transform errors (TRANSFORM domain)
  ERR_TRANSFORM_FAILED = 'ERR_TRANSFORM_FAILED',
  ERR_OVERLAY_UNAVAILABLE = 'ERR_OVERLAY_UNAVAILABLE',

  // Resilience errors (RESILIENCE domain)
  ERR_TIMEOUT = 'ERR_TIMEOUT',
  ERR_CIRCUIT_BREAKER_OPEN = 'ERR_CIRCUIT_BREAKER_OPEN',
  ERR_MAX_RETRIES_EXCEEDED = 'ERR_MAX_RETRIES_EXCEEDED',
  ERR_BACKPRESSURE = 'ERR_BACKPRESSURE',
  ERR_SHUTDOWN = 'ERR_SHUTDOWN',

  // Ingestion errors (INGESTION domain)
  ERR_STARTUP_FAILED = 'ERR_STARTUP_FAILED',
  ERR_EVENT_PROCESSING = 'ERR_EVENT_PROCESSING',
}

export interface ErrorMetadata {
  code: ErrorCode;
  domain: ErrorDomain;
  severity: ErrorSeverity;
  retryable: boolean;
  statusCode: number;
}

const METADATA: Record<ErrorCode, Omit<ErrorMetadata, 'code'>> = {
  [ErrorCode.ERR_INVALID_CONFIG]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_INVALID_WEBHOOK_URL]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_WEBHOOK_PROBE_FAILED]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: false,
    statusCode: 422,
  },
  [ErrorCode.ERR_DESTINATION_NOT_FOUND]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: false,
    statusCode: 404,
  },
  [ErrorCode.ERR_STORAGE_FILE]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_STORAGE_REDIS]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.DEGRADED,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_DECRYPTION_FAILED]: {
    domain: ErrorDomain.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_DELIVERY_TRANSIENT]: {
    domain: ErrorDomain.DELIVERY,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: true,
    statusCode: 502,
  },
  [ErrorCode.ERR_DELIVERY_PERMANENT]: {
    domain: ErrorDomain.DELIVERY,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_RATE_LIMITED]: {
    domain: ErrorDomain.DELIVERY,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: true,
    statusCode: 429,
  },
  [ErrorCode.ERR_PAYLOAD_TOO_LARGE]: {
    domain: ErrorDomain.DELIVERY,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 413,
  },
  [ErrorCode.ERR_TRANSFORM_FAILED]: {
    domain: ErrorDomain.TRANSFORM,
    severity: ErrorSeverity.DEGRADED,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_OVERLAY_UNAVAILABLE]: {
    domain: ErrorDomain.TRANSFORM,
    severity: ErrorSeverity.DEGRADED,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_TIMEOUT]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: true,
    statusCode: 408,
  },
  [ErrorCode.ERR_CIRCUIT_BREAKER_OPEN]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.DEGRADED,
    retryable: false,
    statusCode: 503,
  },
  [ErrorCode.ERR_MAX_RETRIES_EXCEEDED]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 503,
  },
  [ErrorCode.ERR_BACKPRESSURE]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.DEGRADED,
    retryable: false,
    statusCode: 503,
  },
  [ErrorCode.ERR_SHUTDOWN]: {
    domain: ErrorDomain.RESILIENCE,
    severity: ErrorSeverity.DEGRADED,
    retryable: false,
    statusCode: 503,
  },
  [ErrorCode.ERR_STARTUP_FAILED]: {
    domain: ErrorDomain.INGESTION,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 503,
  },
  [ErrorCode.ERR_EVENT_PROCESSING]: {
    domain: ErrorDomain.INGESTION,
    severity: ErrorSeverity.RECOVERABLE,
    retryable: false,
    statusCode: 500,
  },
};

/**
 * Get error metadata for a given error code
 */
export function getErrorMetadata(code: ErrorCode): ErrorMetadata {
  return { code, ...METADATA[code] };
}

/**
 * Check if an error code is retryable
 */
export function isRetryable(code: ErrorCode): boolean {
  return getErrorMetadata(code).retryable;
}
