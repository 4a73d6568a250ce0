/**
 * @webhook-relay/core - Delivery Service Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';

import { TESTING } from '../../config/presets.js';
import { DeliveryService, type DeliveryServiceOptions } from '../../delivery/service.js';
import { DestinationRateLimiter } from '../../rate-limit/rate-limiter.js';
import type { SendOptions, WebhookClient, WebhookResponse } from '../../delivery/webhook-client.js';
import { StatsAggregator } from '../../stats/aggregator.js';
import type { DestinationConfig, OutboundPayload } from '../../types/index.js';

const WEBHOOK = 'https://discord.com/api/webhooks/1001/test-token';

type SendFn = (url: string, payload: OutboundPayload, options: SendOptions) => Promise<WebhookResponse>;

function destination(overrides: Partial<DestinationConfig> = {}): DestinationConfig {
  return {
    id: '-1001',
    name: 'Main',
    targetUrl: WEBHOOK,
    enabled: true,
    filters: { minLength: 0, allowWords: [], denyWords: [], blockedSenderIds: [] },
    watermark: {
      mode: 'none',
      media: { maxBytes: 8 * 1024 * 1024, images: true, videos: true, audio: true, documents: true },
    },
    maxMediaBytes: 8 * 1024 * 1024,
    createdAt: new Date(0),
    updatedAt: new Date(0),
    ...overrides,
  };
}

function answer(status: number, retryAfterMs: number | null = null): Promise<WebhookResponse> {
  return Promise.resolve({ status, retryAfterMs, latencyMs: 1 });
}

/**
 * Answers each call with the next scripted step; the last step repeats.
 */
function scriptedClient(...steps: Array<() => Promise<WebhookResponse>>) {
  let call = 0;
  const send = vi.fn<SendFn>(() => {
    const step = steps[Math.min(call, steps.length - 1)];
    call++;
    return step ? step() : answer(204);
  });
  return { send } satisfies WebhookClient;
}

function hangingClient() {
  const send = vi.fn<SendFn>(
    (_url, _payload, options) =>
      new Promise<WebhookResponse>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      }),
  );
  return { send } satisfies WebhookClient;
}

describe('DeliveryService', () => {
  const services: DeliveryService[] = [];
  let stats: StatsAggregator;

  function createService(
    client: WebhookClient,
    overrides: Partial<DeliveryServiceOptions> = {},
    destinations: DestinationConfig[] = [destination()],
  ): DeliveryService {
    stats = new StatsAggregator();
    const service = new DeliveryService({
      client,
      config: TESTING.delivery,
      circuitBreaker: TESTING.circuitBreaker,
      resolveDestination: (id) => destinations.find((candidate) => candidate.id === id),
      stats,
      ...overrides,
    });
    services.push(service);
    return service;
  }

  afterEach(async () => {
    for (const service of services.splice(0)) {
      await service.shutdown(0);
    }
  });

  describe('deliver', () => {
    it('should deliver on the first accepted answer', async () => {
      const client = scriptedClient(() => answer(204));
      const service = createService(client);

      const result = await service.deliver('-1001', { text: 'hello' });

      expect(result).toMatchObject({ ok: true, value: { destinationId: '-1001', attempts: 1, status: 204 } });
      expect(client.send).toHaveBeenCalledWith(
        WEBHOOK,
        { text: 'hello' },
        expect.objectContaining({ timeoutMs: 1000 }),
      );
      expect(stats.snapshot().messagesReplicated).toBe(1);
    });

    it('should send the destination display overrides', async () => {
      const client = scriptedClient(() => answer(204));
      const service = createService(client, {}, [
        destination({ username: 'Relay', avatarUrl: 'https://example.com/a.png' }),
      ]);

      await service.deliver('-1001', { text: 'hello' });

      expect(client.send.mock.calls[0]?.[1]).toEqual({
        text: 'hello',
        username: 'Relay',
        avatarUrl: 'https://example.com/a.png',
      });
    });

    it('should report unknown destinations', async () => {
      const service = createService(scriptedClient(() => answer(204)));

      const result = await service.deliver('-9999', { text: 'hello' });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'destination-not-found',
          jobId: '',
          destinationId: '-9999',
          attempts: 0,
          reason: 'Destination not found: -9999',
          status: null,
        },
      });
    });

    it('should retry transport errors and 5xx until delivered', async () => {
      const client = scriptedClient(
        () => Promise.reject(new Error('ECONNRESET')),
        () => answer(503),
        () => answer(204),
      );
      const service = createService(client);

      const result = await service.deliver('-1001', { text: 'hello' });

      expect(result).toMatchObject({ ok: true, value: { attempts: 3, status: 204 } });
      expect(client.send).toHaveBeenCalledTimes(3);
      expect(stats.snapshot().retries).toBe(2);
    });

    it('should fail permanently after maxAttempts retryable answers', async () => {
      const client = scriptedClient(() => answer(500));
      const service = createService(client);

      const result = await service.deliver('-1001', { text: 'hello' });

      expect(result).toMatchObject({
        ok: false,
        error: {
          kind: 'failed-permanent',
          attempts: 3,
          status: 500,
          reason: 'Max retries exceeded after 3 attempts',
        },
      });
      expect(client.send).toHaveBeenCalledTimes(3);
      const view = stats.snapshot();
      expect(view.deliveryFailures).toBe(1);
      expect(view.retries).toBe(2);
      expect(view.errorsByStage.delivery).toBe(1);
    });

    it('should not retry permanent client errors', async () => {
      const client = scriptedClient(() => answer(400));
      const service = createService(client);

      const result = await service.deliver('-1001', { text: 'hello' });

      expect(result).toMatchObject({
        ok: false,
        error: { kind: 'failed-permanent', attempts: 1, status: 400, reason: 'HTTP 400' },
      });
      expect(client.send).toHaveBeenCalledTimes(1);
      expect(service.getCircuitSnapshot('-1001').consecutiveFailures).toBe(0);
    });

    it('should wait out a 429 and retry', async () => {
      const client = scriptedClient(
        () => answer(429, 30),
        () => answer(204),
      );
      const service = createService(client);
      const started = Date.now();

      const result = await service.deliver('-1001', { text: 'hello' });

      expect(result).toMatchObject({ ok: true, value: { attempts: 2 } });
      expect(Date.now() - started).toBeGreaterThanOrEqual(25);
      expect(stats.snapshot().rateLimitHits).toBe(1);
      expect(service.getCircuitSnapshot('-1001').consecutiveFailures).toBe(0);
    });

    it('should reject attachments over the destination ceiling without a call', async () => {
      const client = scriptedClient(() => answer(204));
      const service = createService(client, {}, [destination({ maxMediaBytes: 2 })]);

      const result = await service.deliver('-1001', {
        media: { bytes: Buffer.from([1, 2, 3]), kind: 'document', filename: 'a.bin' },
      });

      expect(result).toMatchObject({
        ok: false,
        error: {
          kind: 'failed-permanent',
          attempts: 0,
          reason: 'Attachment of 3 bytes exceeds limit of 2',
        },
      });
      expect(client.send).not.toHaveBeenCalled();
    });
  });

  describe('circuit breaker', () => {
    it('should open after the failure threshold and drop later jobs', async () => {
      const client = scriptedClient(() => answer(500));
      const service = createService(client);

      await service.deliver('-1001', { text: 'first' });

      expect(service.getCircuitSnapshot('-1001')).toMatchObject({ state: 'open', consecutiveFailures: 3 });
      expect(stats.snapshot().circuitTrips).toBe(1);

      const dropped = await service.deliver('-1001', { text: 'second' });

      expect(dropped).toMatchObject({ ok: false, error: { kind: 'dropped-circuit-open', reason: 'circuit open' } });
      expect(client.send).toHaveBeenCalledTimes(3);
      expect(stats.snapshot().circuitDrops).toBe(1);
    });

    it('should keep counting server errors across rate limits', async () => {
      const client = scriptedClient(
        () => answer(500),
        () => answer(429, 5),
        () => answer(500),
      );
      const service = createService(client);

      const result = await service.deliver('-1001', { text: 'hello' });

      expect(result).toMatchObject({ ok: false, error: { kind: 'failed-permanent', attempts: 3, status: 500 } });
      expect(service.getCircuitSnapshot('-1001')).toMatchObject({ state: 'closed', consecutiveFailures: 2 });
    });

    it('should drop jobs for an open circuit without waiting on a hold-off', async () => {
      const rateLimiter = new DestinationRateLimiter();
      const client = scriptedClient(() => answer(500));
      const service = createService(client, { rateLimiter });
      await service.deliver('-1001', { text: 'first' });
      rateLimiter.holdOff('-1001', 10_000);
      const started = Date.now();

      const dropped = await service.deliver('-1001', { text: 'second' });

      expect(dropped).toMatchObject({ ok: false, error: { kind: 'dropped-circuit-open' } });
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('should keep circuits per destination', async () => {
      const client = scriptedClient(() => answer(500));
      const service = createService(client, {}, [destination(), destination({ id: '-1002' })]);

      await service.deliver('-1002', { text: 'hello' });

      expect(service.getCircuitSnapshot('-1001').state).toBe('closed');
      expect(service.listCircuits().map((circuit) => [circuit.destinationId, circuit.state])).toEqual([
        ['-1002', 'open'],
      ]);
    });

    it('should forget the circuit of a deleted destination', async () => {
      const service = createService(scriptedClient(() => answer(500)));
      await service.deliver('-1001', { text: 'hello' });

      service.forgetDestination('-1001');

      expect(service.getCircuitSnapshot('-1001')).toEqual({
        destinationId: '-1001',
        state: 'closed',
        consecutiveFailures: 0,
        openedAt: null,
        recoveryTimeoutMs: 200,
      });
      expect(service.listCircuits()).toEqual([]);
    });
  });

  describe('submit', () => {
    it('should run submitted jobs in the background', async () => {
      const client = scriptedClient(() => answer(204));
      const service = createService(client);

      const receipt = service.submit(destination(), { text: 'hello' });

      expect(receipt.accepted).toBe(true);
      await vi.waitFor(() => expect(stats.snapshot().messagesReplicated).toBe(1));
    });

    it('should drop jobs beyond the queue size', async () => {
      const service = createService(hangingClient(), {
        config: { ...TESTING.delivery, queueSize: 1 },
      });

      const first = service.submit(destination(), { text: 'one' });
      const second = service.submit(destination(), { text: 'two' });

      expect(first.accepted).toBe(true);
      expect(second).toMatchObject({ accepted: false, reason: 'dropped-backpressure' });
      expect(stats.snapshot().backpressureDrops).toBe(1);
      expect(service.getStatus()).toMatchObject({ admitted: 1, queueSize: 1 });
    });

    it('should cap concurrent calls at maxConcurrency', async () => {
      let active = 0;
      let peak = 0;
      const send = vi.fn<SendFn>(async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 20));
        active--;
        return { status: 204, retryAfterMs: null, latencyMs: 20 };
      });
      const service = createService({ send });

      for (let i = 0; i < 5; i++) {
        service.submit(destination(), { text: `message ${String(i)}` });
      }

      await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(5), { timeout: 2000 });
      await vi.waitFor(() => expect(service.getStatus().admitted).toBe(0));
      expect(peak).toBe(2);
    });
  });

  describe('shutdown', () => {
    it('should refuse new jobs', async () => {
      const service = createService(scriptedClient(() => answer(204)));

      await service.shutdown(0);

      expect(service.submit(destination(), { text: 'late' })).toMatchObject({
        accepted: false,
        reason: 'shutdown',
      });
      expect(service.getStatus().accepting).toBe(false);
    });

    it('should wait for in-flight jobs within the grace period', async () => {
      const slowAnswer = () =>
        new Promise<WebhookResponse>((resolve) => {
          setTimeout(() => resolve({ status: 204, retryAfterMs: null, latencyMs: 10 }), 10);
        });
      const client = scriptedClient(slowAnswer);
      const service = createService(client);
      const pending = service.deliver('-1001', { text: 'hello' });

      await service.shutdown(1000);

      expect(await pending).toMatchObject({ ok: true });
    });

    it('should cancel jobs still running after the grace period', async () => {
      const service = createService(hangingClient());
      const pending = service.deliver('-1001', { text: 'hello' });

      await service.shutdown(20);

      expect(await pending).toMatchObject({
        ok: false,
        error: { kind: 'failed-permanent', reason: 'shutdown', attempts: 1 },
      });
    });
  });
});
