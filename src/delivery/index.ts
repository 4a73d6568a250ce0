export { DeliveryService } from './service.js';
export type {
  DeliveryErrorKind,
  DeliveryFailure,
  DeliveryOutcome,
  DeliveryResult,
  DeliveryServiceOptions,
  DeliveryServiceStatus,
  SubmitReceipt,
} from './service.js';
export { DestinationCircuit } from './circuit.js';
export type { DestinationCircuitOptions, GuardedResult, OutcomeVerdict } from './circuit.js';
export { computeBackoff } from './backoff.js';
export type { BackoffPolicy } from './backoff.js';
export {
  breakerVerdict,
  classifyStatus,
  classifyTransportError,
  parseRetryAfter,
} from './classify.js';
export type { AttemptClass } from './classify.js';
export {
  AxiosWebhookClient,
  WebhookTimeoutError,
  buildJsonBody,
  buildMultipartBody,
  MAX_CONTENT_LENGTH,
} from './webhook-client.js';
export type { SendOptions, WebhookClient, WebhookJsonBody, WebhookResponse } from './webhook-client.js';
