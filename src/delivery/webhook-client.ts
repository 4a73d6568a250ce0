/**
 * @webhook-relay/core - Webhook Client
 *
 * One HTTP POST per call. Text-only payloads go as JSON; payloads with
 * media go as multipart with `payload_json` and `files[0]`. Status codes
 * are returned, never thrown; transport failures and timeouts reject.
 */

import axios, { type AxiosInstance } from 'axios';

import type { OutboundPayload } from '../types/index.js';
import { parseRetryAfter } from './classify.js';

/** Message content limit of a webhook message */
export const MAX_CONTENT_LENGTH = 2000;

export interface WebhookJsonBody {
  content: string;
  username?: string;
  avatar_url?: string;
  allowed_mentions: { parse: string[] };
}

export interface WebhookResponse {
  status: number;
  /** Retry hint of a 429 answer */
  retryAfterMs: number | null;
  latencyMs: number;
}

export interface SendOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface WebhookClient {
  send(url: string, payload: OutboundPayload, options: SendOptions): Promise<WebhookResponse>;
}

export class WebhookTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Webhook call timed out after ${String(timeoutMs)}ms`);
    this.name = 'WebhookTimeoutError';
  }
}

/** Cuts on code points so a surrogate pair is never split */
function truncateContent(text: string): string {
  if (text.length <= MAX_CONTENT_LENGTH) return text;
  return Array.from(text).slice(0, MAX_CONTENT_LENGTH).join('');
}

export function buildJsonBody(payload: OutboundPayload): WebhookJsonBody {
  const body: WebhookJsonBody = {
    content: truncateContent(payload.text ?? ''),
    allowed_mentions: { parse: [] },
  };
  if (payload.username) body.username = payload.username;
  if (payload.avatarUrl) body.avatar_url = payload.avatarUrl;
  return body;
}

export function buildMultipartBody(payload: OutboundPayload): FormData {
  const form = new FormData();
  form.append('payload_json', JSON.stringify(buildJsonBody(payload)));
  if (payload.media) {
    const blob = new Blob([payload.media.bytes], {
      type: payload.media.mimeType ?? 'application/octet-stream',
    });
    form.append('files[0]', blob, payload.media.filename);
  }
  return form;
}

function headerRecord(headers: unknown): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  if (typeof headers === 'object' && headers !== null) {
    for (const [key, value] of Object.entries(headers)) {
      record[key.toLowerCase()] = value;
    }
  }
  return record;
}

export class AxiosWebhookClient implements WebhookClient {
  private readonly http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http = http ?? axios.create();
  }

  async send(url: string, payload: OutboundPayload, options: SendOptions): Promise<WebhookResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const started = Date.now();
    try {
      const body = payload.media ? buildMultipartBody(payload) : buildJsonBody(payload);
      const response = await this.http.post<unknown>(url, body, {
        timeout: options.timeoutMs,
        signal: controller.signal,
        validateStatus: () => true,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      });

      return {
        status: response.status,
        retryAfterMs:
          response.status === 429 ? parseRetryAfter(headerRecord(response.headers), response.data) : null,
        latencyMs: Date.now() - started,
      };
    } catch (error) {
      if (timedOut) {
        throw new WebhookTimeoutError(options.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
