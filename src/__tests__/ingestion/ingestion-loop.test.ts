/**
 * @webhook-relay/core - Ingestion Loop Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';

import { TESTING } from '../../config/presets.js';
import { DeliveryService } from '../../delivery/service.js';
import type { SendOptions, WebhookResponse } from '../../delivery/webhook-client.js';
import { MemoryDestinationBackend } from '../../destinations/backend.js';
import { DestinationConfigStore } from '../../destinations/store.js';
import { StartupError } from '../../errors/relay-errors.js';
import { DedupWindow } from '../../ingestion/dedup.js';
import { IngestionLoop } from '../../ingestion/ingestion-loop.js';
import { EventEmitterSource } from '../../ingestion/source.js';
import { StatsAggregator } from '../../stats/aggregator.js';
import type { InboundMessage, OutboundPayload } from '../../types/index.js';
import { TransformEngine } from '../../watermark/engine.js';
import { OverlayCache } from '../../watermark/overlay-cache.js';

const WEBHOOK = 'https://discord.com/api/webhooks/1001/test-token';

type SendFn = (url: string, payload: OutboundPayload, options: SendOptions) => Promise<WebhookResponse>;

function message(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return { sourceMessageId: 'm1', chatId: '-1001', senderId: 'u1', text: 'hello', ...overrides };
}

describe('IngestionLoop', () => {
  let source: EventEmitterSource;
  let store: DestinationConfigStore;
  let stats: StatsAggregator;
  let delivery: DeliveryService;
  let send: Mock<SendFn>;
  let loop: IngestionLoop;

  function createLoop(from: EventEmitterSource = source): IngestionLoop {
    return new IngestionLoop({
      source: from,
      store,
      engine: new TransformEngine({
        overlayCache: new OverlayCache({ readAsset: (path) => Promise.reject(new Error(`no file ${path}`)) }),
        config: TESTING.transform,
        stats,
      }),
      delivery,
      stats,
      dedup: new DedupWindow(TESTING.dedup),
      environment: 'test',
    });
  }

  beforeEach(async () => {
    source = new EventEmitterSource();
    store = new DestinationConfigStore(new MemoryDestinationBackend());
    stats = new StatsAggregator();
    send = vi.fn<SendFn>(() => Promise.resolve({ status: 204, retryAfterMs: null, latencyMs: 1 }));
    delivery = new DeliveryService({
      client: { send },
      config: TESTING.delivery,
      circuitBreaker: TESTING.circuitBreaker,
      resolveDestination: (id) => store.get(id),
      stats,
    });
    await store.upsert({
      id: '-1001',
      targetUrl: WEBHOOK,
      watermark: { mode: 'text', text: { content: '[relayed]' } },
    });
    loop = createLoop();
  });

  afterEach(async () => {
    await loop.stop();
    await delivery.shutdown(0);
  });

  it('should connect and listen on start', async () => {
    expect(loop.state).toBe('idle');

    await loop.start();

    expect(loop.state).toBe('listening');
    expect(source.isConnected).toBe(true);
    expect(source.listenerCount).toBe(1);
  });

  it('should refuse to start twice', async () => {
    await loop.start();

    await expect(loop.start()).rejects.toThrow('Ingestion loop cannot start from state listening');
  });

  it('should wrap connect failures in StartupError', async () => {
    const failing = createLoop(new EventEmitterSource(() => Promise.reject(new Error('auth rejected'))));

    const error: unknown = await failing.start().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(StartupError);
    expect(error).toMatchObject({ message: 'Could not connect to the source platform' });
    expect(failing.state).toBe('idle');
  });

  it('should watermark and submit messages for a configured chat', async () => {
    await loop.start();

    source.emit(message());
    await loop.settle();

    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));
    expect(send.mock.calls[0]?.[0]).toBe(WEBHOOK);
    expect(send.mock.calls[0]?.[1]).toEqual({ text: 'hello [relayed]' });
    await vi.waitFor(() => expect(stats.snapshot().messagesReplicated).toBe(1));
    expect(stats.snapshot()).toMatchObject({ messagesSeen: 1, watermarksApplied: 1 });
  });

  it('should skip duplicate source message ids', async () => {
    await loop.start();

    source.emit(message());
    source.emit(message());
    await loop.settle();

    await vi.waitFor(() => expect(stats.snapshot().messagesReplicated).toBe(1));
    expect(send).toHaveBeenCalledTimes(1);
    expect(stats.snapshot()).toMatchObject({ messagesSeen: 2, duplicatesSkipped: 1 });
  });

  it('should ignore messages without text or media', async () => {
    await loop.start();

    source.emit(message({ text: '   ' }));
    await loop.settle();

    expect(stats.snapshot().messagesSeen).toBe(0);
    expect(loop.inProgress).toBe(0);
  });

  it('should do nothing for chats without a destination', async () => {
    await loop.start();

    source.emit(message({ chatId: '-2002' }));
    await loop.settle();

    expect(stats.snapshot().messagesSeen).toBe(1);
    expect(delivery.getStatus().admitted).toBe(0);
    expect(send).not.toHaveBeenCalled();
  });

  it('should count filtered messages', async () => {
    await store.upsert({ id: '-1001', targetUrl: WEBHOOK, filters: { denyWords: ['hello'] } });
    await loop.start();

    source.emit(message());
    await loop.settle();

    expect(stats.snapshot().messagesFiltered).toBe(1);
    expect(send).not.toHaveBeenCalled();
  });

  it('should submit nothing for disabled destinations', async () => {
    await store.upsert({ id: '-1001', targetUrl: WEBHOOK, enabled: false });
    await loop.start();

    source.emit(message());
    await loop.settle();

    expect(stats.snapshot().messagesFiltered).toBe(0);
    expect(delivery.getStatus().admitted).toBe(0);
    expect(send).not.toHaveBeenCalled();
  });

  it('should see configuration changes on the next message', async () => {
    await loop.start();
    await store.upsert({ id: '-1001', targetUrl: WEBHOOK, watermark: { mode: 'none' } });

    source.emit(message());
    await loop.settle();

    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));
    expect(send.mock.calls[0]?.[1]).toEqual({ text: 'hello' });
  });

  it('should keep listening after one message fails to dispatch', async () => {
    vi.spyOn(store, 'findForChat').mockImplementationOnce(() => {
      throw new Error('lookup failed');
    });
    await loop.start();

    source.emit(message({ sourceMessageId: 'm1', text: 'first' }));
    source.emit(message({ sourceMessageId: 'm2', text: 'second' }));
    await loop.settle();

    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));
    expect(send.mock.calls[0]?.[1]).toEqual({ text: 'second [relayed]' });
    expect(loop.state).toBe('listening');
    await vi.waitFor(() =>
      expect(stats.snapshot()).toMatchObject({ messagesSeen: 2, errorsByStage: { ingestion: 1 } }),
    );
  });

  it('should count a failed forward and carry on with later messages', async () => {
    const submit = vi.spyOn(delivery, 'submit').mockImplementationOnce(() => {
      throw new Error('queue unavailable');
    });
    await loop.start();

    source.emit(message({ sourceMessageId: 'm1' }));
    await loop.settle();
    source.emit(message({ sourceMessageId: 'm2' }));
    await loop.settle();

    expect(submit).toHaveBeenCalledTimes(2);
    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));
    expect(stats.snapshot().errorsByStage.ingestion).toBe(1);
  });

  it('should unsubscribe and disconnect on stop', async () => {
    await loop.start();

    await loop.stop();

    expect(loop.state).toBe('stopped');
    expect(source.isConnected).toBe(false);
    expect(source.emit(message())).toBe(false);
    expect(stats.snapshot().messagesSeen).toBe(0);
  });
});
