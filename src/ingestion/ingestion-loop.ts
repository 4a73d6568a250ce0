/**
 * @webhook-relay/core - Ingestion Loop
 *
 * Listens to the source platform and fans each message out to its
 * destinations: de-dup, store lookup, filters, transform, submit.
 * Dispatch is fire-and-forget; the handler returns before any delivery
 * completes and an error in one message never stops the loop.
 *
 * States: idle → listening ⇄ dispatching → stopped
 */

import { withContext } from '../context/execution-context.js';
import type { DeliveryService } from '../delivery/service.js';
import type { DestinationConfigStore } from '../destinations/store.js';
import { evaluateFilters } from '../destinations/filters.js';
import { StartupError } from '../errors/relay-errors.js';
import { NullLogger, type StructuredLogger } from '../logger/index.js';
import type { StatsAggregator } from '../stats/aggregator.js';
import type { RelayEnvironment } from '../types/config.js';
import type { DestinationConfig, InboundMessage } from '../types/index.js';
import type { TransformEngine } from '../watermark/engine.js';
import type { DedupWindow } from './dedup.js';
import type { SourceClient } from './source.js';

export type IngestionState = 'idle' | 'listening' | 'dispatching' | 'stopped';

export interface IngestionLoopOptions {
  source: SourceClient;
  store: DestinationConfigStore;
  engine: TransformEngine;
  delivery: DeliveryService;
  stats: StatsAggregator;
  dedup: DedupWindow;
  logger?: StructuredLogger;
  environment?: RelayEnvironment;
}

export class IngestionLoop {
  private readonly source: SourceClient;
  private readonly store: DestinationConfigStore;
  private readonly engine: TransformEngine;
  private readonly delivery: DeliveryService;
  private readonly stats: StatsAggregator;
  private readonly dedup: DedupWindow;
  private readonly logger: StructuredLogger;
  private readonly environment: RelayEnvironment;

  private phase: 'idle' | 'listening' | 'stopped' = 'idle';
  private unsubscribe: (() => void) | null = null;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: IngestionLoopOptions) {
    this.source = options.source;
    this.store = options.store;
    this.engine = options.engine;
    this.delivery = options.delivery;
    this.stats = options.stats;
    this.dedup = options.dedup;
    this.logger = options.logger ?? new NullLogger();
    this.environment = options.environment ?? 'production';
  }

  get state(): IngestionState {
    if (this.phase === 'listening' && this.pending.size > 0) return 'dispatching';
    return this.phase;
  }

  /** Messages whose fan-out has not finished yet */
  get inProgress(): number {
    return this.pending.size;
  }

  /**
   * @throws {StartupError} when the source cannot be reached
   */
  async start(): Promise<void> {
    if (this.phase !== 'idle') {
      throw new StartupError(`Ingestion loop cannot start from state ${this.phase}`);
    }

    try {
      await this.source.connect();
    } catch (error) {
      this.logger.error('Source connection failed', error, { action: 'ingestion_start_failed' });
      throw new StartupError('Could not connect to the source platform', error);
    }

    this.unsubscribe = this.source.onMessage((message) => {
      this.handle(message);
    });
    this.phase = 'listening';
    this.logger.info('Ingestion loop listening', {
      action: 'ingestion_started',
      destinations: this.store.size,
    });
  }

  /**
   * Unsubscribes, disconnects and waits for in-progress fan-outs. Draining
   * the delivery queue is left to the owner.
   */
  async stop(): Promise<void> {
    if (this.phase === 'stopped') return;
    const wasListening = this.phase === 'listening';
    this.phase = 'stopped';

    this.unsubscribe?.();
    this.unsubscribe = null;

    if (wasListening) {
      try {
        await this.source.disconnect();
      } catch (error) {
        this.logger.warn('Source disconnect failed', {
          action: 'ingestion_disconnect_failed',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await Promise.allSettled(Array.from(this.pending));
    this.logger.info('Ingestion loop stopped', { action: 'ingestion_stopped' });
  }

  /**
   * Waits until every message received so far has been fanned out.
   */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  private handle(message: InboundMessage): void {
    if (this.phase !== 'listening') return;

    const hasText = (message.text ?? '').trim() !== '';
    if (!hasText && !message.media) {
      this.logger.debug('Ignoring empty message', {
        action: 'message_empty',
        chatId: message.chatId,
      });
      return;
    }

    this.stats.recordSeen();

    if (this.dedup.checkAndRemember(message.chatId, message.sourceMessageId)) {
      this.stats.recordDuplicate();
      this.logger.debug('Duplicate message skipped', {
        action: 'message_duplicate',
        chatId: message.chatId,
        sourceMessageId: message.sourceMessageId,
      });
      return;
    }

    const work = withContext(
      {
        correlationId: `${message.chatId}:${message.sourceMessageId}`,
        chatId: message.chatId,
        environment: this.environment,
      },
      async () => await this.dispatch(message),
    );

    this.pending.add(work);
    work
      .finally(() => {
        this.pending.delete(work);
      })
      .catch((error: unknown) => {
        this.stats.recordError('ingestion');
        this.logger.error('Message dispatch failed', error, {
          action: 'message_dispatch_failed',
          chatId: message.chatId,
        });
      });
  }

  private async dispatch(message: InboundMessage): Promise<void> {
    const destinations = this.store.findForChat(message.chatId);

    for (const destination of destinations) {
      const decision = evaluateFilters(message, destination);
      if (!decision.pass) {
        if (decision.reason !== 'disabled') {
          this.stats.recordFiltered();
        }
        this.logger.debug('Message filtered', {
          action: 'message_filtered',
          destinationId: destination.id,
          reason: decision.reason,
        });
        continue;
      }

      try {
        await this.forward(message, destination);
      } catch (error) {
        this.stats.recordError('ingestion');
        this.logger.error('Forwarding to destination failed', error, {
          action: 'message_forward_failed',
          destinationId: destination.id,
          sourceMessageId: message.sourceMessageId,
        });
      }
    }
  }

  private async forward(message: InboundMessage, destination: Readonly<DestinationConfig>): Promise<void> {
    const result = await this.engine.transform(
      { text: message.text, media: message.media },
      destination.watermark,
      destination.maxMediaBytes,
    );
    if (result.watermarked) {
      this.stats.recordWatermark();
    }

    const receipt = this.delivery.submit(destination, result.payload);
    if (receipt.accepted) {
      this.logger.debug('Delivery submitted', {
        action: 'delivery_submitted',
        destinationId: destination.id,
        jobId: receipt.jobId,
        applied: result.applied.join(','),
      });
    }
  }
}
