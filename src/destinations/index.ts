/**
 * @webhook-relay/core - Destinations
 *
 * Destination config store and its durable backends.
 */

export { DestinationConfigStore } from './store.js';
export type { DestinationStoreOptions } from './store.js';

export { MemoryDestinationBackend } from './backend.js';
export type { DestinationBackend } from './backend.js';
export { FileDestinationBackend } from './file-backend.js';
export type { FileBackendOptions } from './file-backend.js';
export { RedisDestinationBackend } from './redis-backend.js';
export type { RedisBackendOptions } from './redis-backend.js';

export {
  DESTINATION_SCHEMA_VERSION,
  serializeDestination,
  deserializeDestination,
  freezeDestination,
  toStoredDestination,
} from './codec.js';
export type { StoredDestination } from './codec.js';
export { SecretCodec } from './secret-codec.js';
export { evaluateFilters } from './filters.js';
export type { FilterDecision, FilterRejection } from './filters.js';
