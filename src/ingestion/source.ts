/**
 * @webhook-relay/core - Source Client
 *
 * Contract of the messaging platform connection that feeds the relay,
 * plus an EventEmitter-backed implementation for embedding and tests.
 */

import { EventEmitter } from 'events';

import type { InboundMessage } from '../types/index.js';

export type MessageHandler = (message: InboundMessage) => void;

export interface SourceClient {
  connect(): Promise<void>;
  /** @returns a function that removes the handler */
  onMessage(handler: MessageHandler): () => void;
  disconnect(): Promise<void>;
}

/**
 * Source fed by `emit(message)`. A connect failure can be injected.
 */
export class EventEmitterSource implements SourceClient {
  private readonly events = new EventEmitter();
  private connected = false;

  constructor(private readonly connectImpl: () => Promise<void> = async () => {}) {}

  get isConnected(): boolean {
    return this.connected;
  }

  get listenerCount(): number {
    return this.events.listenerCount('message');
  }

  async connect(): Promise<void> {
    await this.connectImpl();
    this.connected = true;
  }

  onMessage(handler: MessageHandler): () => void {
    this.events.on('message', handler);
    return () => {
      this.events.off('message', handler);
    };
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.events.removeAllListeners('message');
    await Promise.resolve();
  }

  /**
   * @returns false when nothing is subscribed
   */
  emit(message: InboundMessage): boolean {
    return this.events.emit('message', message);
  }
}
