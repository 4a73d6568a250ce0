export {
  ErrorCode,
  ErrorDomain,
  ErrorSeverity,
  getErrorMetadata,
  isRetryable,
} from './hierarchy.js';
export type { ErrorMetadata } from './hierarchy.js';

export {
  RelayError,
  ConfigValidationError,
  DestinationNotFoundError,
  StorageError,
  StartupError,
} from './relay-errors.js';
export type { ConfigIssue } from './relay-errors.js';

export { ok, err } from './result.js';
export type { Result } from './result.js';
