/**
 * @webhook-relay/core - Message De-duplication
 *
 * Per-chat recency window of source message ids. Each chat keeps the last
 * `windowSize` ids (LRU); chats themselves are bounded by `maxChats`.
 */

import { LRUCache } from 'lru-cache';

import type { DedupConfig } from '../types/config.js';
import type { ChatId } from '../types/index.js';

export class DedupWindow {
  private readonly chats: LRUCache<ChatId, LRUCache<string, true>>;

  constructor(private readonly config: DedupConfig) {
    this.chats = new LRUCache<ChatId, LRUCache<string, true>>({ max: config.maxChats });
  }

  /**
   * Records the id and reports whether it was already in the window.
   */
  checkAndRemember(chatId: ChatId, sourceMessageId: string): boolean {
    const window = this.windowFor(chatId);
    if (window.has(sourceMessageId)) {
      window.get(sourceMessageId);
      return true;
    }
    window.set(sourceMessageId, true);
    return false;
  }

  has(chatId: ChatId, sourceMessageId: string): boolean {
    return this.chats.peek(chatId)?.has(sourceMessageId) ?? false;
  }

  /** Ids remembered for a chat */
  sizeOf(chatId: ChatId): number {
    return this.chats.peek(chatId)?.size ?? 0;
  }

  get chatCount(): number {
    return this.chats.size;
  }

  clear(): void {
    this.chats.clear();
  }

  private windowFor(chatId: ChatId): LRUCache<string, true> {
    let window = this.chats.get(chatId);
    if (!window) {
      window = new LRUCache<string, true>({
        max: this.config.windowSize,
        ...(this.config.ttlMs > 0 ? { ttl: this.config.ttlMs } : {}),
      });
      this.chats.set(chatId, window);
    }
    return window;
  }
}
