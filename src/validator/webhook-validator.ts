/**
 * @webhook-relay/core - Webhook Validator
 *
 * Checks that a webhook URL is well formed and accepts a message.
 * A malformed URL fails without any request; otherwise one probe message
 * is sent and only the accepted status counts as valid.
 */

import type { WebhookClient } from '../delivery/webhook-client.js';
import { WebhookTimeoutError } from '../delivery/webhook-client.js';
import { ErrorCode } from '../errors/hierarchy.js';
import { err, ok, type Result } from '../errors/result.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import type { ValidatorConfig } from '../types/config.js';
import { isWebhookUrl } from '../validation/schemas.js';

export interface WebhookCheck {
  valid: true;
  latencyMs: number;
  message: string;
  status: number;
}

export interface WebhookCheckFailure {
  valid: false;
  latencyMs: number;
  message: string;
  /** HTTP status of the probe, null when no answer was received */
  status: number | null;
  code: ErrorCode.ERR_INVALID_WEBHOOK_URL | ErrorCode.ERR_WEBHOOK_PROBE_FAILED | ErrorCode.ERR_TIMEOUT;
}

export type WebhookValidation = Result<WebhookCheck, WebhookCheckFailure>;

export class WebhookValidator {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly client: WebhookClient,
    private readonly config: ValidatorConfig,
    logger?: StructuredLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.logger = logger ?? new NullLogger();
  }

  async validate(url: string): Promise<WebhookValidation> {
    const target = url.trim();
    if (!isWebhookUrl(target)) {
      return err({
        valid: false,
        latencyMs: 0,
        message: 'URL is not a webhook URL (expected https://discord.com/api/webhooks/<id>/<token>)',
        status: null,
        code: ErrorCode.ERR_INVALID_WEBHOOK_URL,
      });
    }

    const started = this.now();
    try {
      const response = await this.client.send(
        target,
        { text: this.config.probeContent, username: this.config.probeUsername },
        { timeoutMs: this.config.timeoutMs },
      );
      const latencyMs = Math.max(0, this.now() - started);

      if (response.status === this.config.acceptedStatus) {
        this.logger.info('Webhook validated', {
          action: 'webhook_validated',
          webhookUrl: target,
          latencyMs,
        });
        return ok({ valid: true, latencyMs, message: 'Webhook accepted the probe message', status: response.status });
      }

      this.logger.warn('Webhook probe rejected', {
        action: 'webhook_probe_rejected',
        webhookUrl: target,
        status: response.status,
      });
      return err({
        valid: false,
        latencyMs,
        message: describeStatus(response.status),
        status: response.status,
        code: ErrorCode.ERR_WEBHOOK_PROBE_FAILED,
      });
    } catch (error) {
      const latencyMs = Math.max(0, this.now() - started);
      if (error instanceof WebhookTimeoutError) {
        return err({
          valid: false,
          latencyMs,
          message: `Webhook did not answer within ${String(this.config.timeoutMs / 1000)}s`,
          status: null,
          code: ErrorCode.ERR_TIMEOUT,
        });
      }
      return err({
        valid: false,
        latencyMs,
        message: `Webhook unreachable: ${error instanceof Error ? error.message : String(error)}`,
        status: null,
        code: ErrorCode.ERR_WEBHOOK_PROBE_FAILED,
      });
    }
  }
}

function describeStatus(status: number): string {
  switch (status) {
    case 401:
    case 403:
      return `Webhook refused the probe (HTTP ${String(status)}): token is invalid`;
    case 404:
      return 'Webhook not found (HTTP 404): it was deleted or the URL is wrong';
    case 429:
      return 'Webhook is rate limited (HTTP 429), try again later';
    default:
      return `Webhook answered HTTP ${String(status)}`;
  }
}
