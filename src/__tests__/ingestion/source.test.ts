/**
 * @webhook-relay/core - Event Emitter Source Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { EventEmitterSource } from '../../ingestion/source.js';
import type { InboundMessage } from '../../types/index.js';

const MESSAGE: InboundMessage = { sourceMessageId: 'm1', chatId: '-1001', senderId: 'u1', text: 'hi' };

describe('EventEmitterSource', () => {
  it('should deliver emitted messages to subscribers', async () => {
    const source = new EventEmitterSource();
    const handler = vi.fn();
    await source.connect();
    source.onMessage(handler);

    expect(source.emit(MESSAGE)).toBe(true);
    expect(handler).toHaveBeenCalledWith(MESSAGE);
    expect(source.isConnected).toBe(true);
  });

  it('should stop delivering after unsubscribe', () => {
    const source = new EventEmitterSource();
    const handler = vi.fn();
    const unsubscribe = source.onMessage(handler);

    unsubscribe();

    expect(source.emit(MESSAGE)).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should surface connect failures', async () => {
    const source = new EventEmitterSource(() => Promise.reject(new Error('auth rejected')));

    await expect(source.connect()).rejects.toThrow('auth rejected');
    expect(source.isConnected).toBe(false);
  });

  it('should drop all subscribers on disconnect', async () => {
    const source = new EventEmitterSource();
    source.onMessage(vi.fn());
    source.onMessage(vi.fn());
    await source.connect();

    await source.disconnect();

    expect(source.listenerCount).toBe(0);
    expect(source.isConnected).toBe(false);
  });
});
