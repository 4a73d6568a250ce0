export { WebhookValidator } from './webhook-validator.js';
export type { WebhookCheck, WebhookCheckFailure, WebhookValidation } from './webhook-validator.js';
