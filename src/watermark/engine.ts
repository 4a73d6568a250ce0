/**
 * @webhook-relay/core - Transform Engine
 *
 * Applies a destination's watermark settings to a relay payload.
 * Text is rewritten with the prefix/content/suffix formula; images are
 * composited and re-encoded under the size ceiling; video, audio and
 * documents pass through. A failed media transform never blocks delivery:
 * the original media is kept and one transform error is recorded.
 */

import { NullLogger, type StructuredLogger } from '../logger/index.js';
import { transformLatencyHistogram } from '../metrics/index.js';
import type { StatsAggregator } from '../stats/aggregator.js';
import type { TransformConfig } from '../types/config.js';
import type {
  MediaAttachment,
  MediaKind,
  MediaToggles,
  OverlayWatermark,
  RelayPayload,
  TextWatermark,
  WatermarkConfig,
} from '../types/index.js';
import { MIME_TYPES, processImage, type OverlayLayer, type TextLayer } from './image.js';
import { withExtension } from './media.js';
import type { OverlayCache } from './overlay-cache.js';

export type AppliedOperation = 'text' | 'image-text' | 'image-overlay' | 'image-resize';

export interface TransformResult {
  payload: RelayPayload;
  /** True when any watermark (text or visual) was applied */
  watermarked: boolean;
  applied: AppliedOperation[];
}

export interface TransformEngineOptions {
  overlayCache: OverlayCache;
  config: TransformConfig;
  logger?: StructuredLogger;
  stats?: StatsAggregator;
}

/**
 * `prefix + source + separator + content + suffix`; the separator is only
 * used when both source and content are non-empty.
 */
export function applyTextWatermark(source: string | undefined, text: TextWatermark): string | undefined {
  const body = source ?? '';
  let core = body;
  if (text.content) {
    core = body ? `${body}${text.separator}${text.content}` : text.content;
  }
  const result = `${text.prefix}${core}${text.suffix}`;
  return result === '' ? source : result;
}

function textSettings(watermark: WatermarkConfig): TextWatermark | undefined {
  return watermark.mode === 'text' || watermark.mode === 'both' ? watermark.text : undefined;
}

function overlaySettings(watermark: WatermarkConfig): OverlayWatermark | undefined {
  return watermark.mode === 'image-overlay' || watermark.mode === 'both'
    ? watermark.overlay
    : undefined;
}

function isKindEnabled(kind: MediaKind, media: MediaToggles): boolean {
  switch (kind) {
    case 'image':
      return media.images;
    case 'video':
      return media.videos;
    case 'audio':
      return media.audio;
    case 'document':
      return media.documents;
  }
}

export class TransformEngine {
  private readonly overlayCache: OverlayCache;
  private readonly config: TransformConfig;
  private readonly logger: StructuredLogger;
  private readonly stats?: StatsAggregator;

  constructor(options: TransformEngineOptions) {
    this.overlayCache = options.overlayCache;
    this.config = options.config;
    this.logger = options.logger ?? new NullLogger();
    this.stats = options.stats;
  }

  /**
   * @param ceilingBytes destination attachment ceiling; the effective limit is
   *   the smaller of this and the watermark's media `maxBytes`
   */
  async transform(
    payload: RelayPayload,
    watermark: WatermarkConfig,
    ceilingBytes: number = Number.POSITIVE_INFINITY,
  ): Promise<TransformResult> {
    const applied: AppliedOperation[] = [];
    const text = textSettings(watermark);

    let outText = payload.text;
    if (text) {
      outText = applyTextWatermark(payload.text, text);
      if (outText !== payload.text) applied.push('text');
    }

    let outMedia = payload.media;
    if (payload.media) {
      this.stats?.recordMediaProcessed(payload.media.kind);
      outMedia = await this.transformMedia(payload.media, watermark, ceilingBytes, applied);
    }

    const result: RelayPayload = {};
    if (outText !== undefined) result.text = outText;
    if (outMedia) result.media = outMedia;

    return {
      payload: result,
      watermarked: applied.some((op) => op !== 'image-resize'),
      applied,
    };
  }

  private async transformMedia(
    media: MediaAttachment,
    watermark: WatermarkConfig,
    ceilingBytes: number,
    applied: AppliedOperation[],
  ): Promise<MediaAttachment> {
    if (media.kind !== 'image' || !isKindEnabled(media.kind, watermark.media)) {
      return media;
    }

    const maxBytes = Math.min(watermark.media.maxBytes, ceilingBytes);
    const text = textSettings(watermark);
    const overlay = overlaySettings(watermark);
    const hasTextLayer = !!text && text.content.trim() !== '';
    if (!hasTextLayer && !overlay && media.bytes.length <= maxBytes) {
      return media;
    }

    const endTimer = transformLatencyHistogram.startTimer({ kind: media.kind });
    try {
      const overlayLayer: OverlayLayer | undefined = overlay
        ? {
            asset: await this.overlayCache.get(overlay.assetPath),
            position: overlay.position,
            scale: overlay.scale,
            opacity: overlay.opacity,
            offsetX: overlay.offsetX,
            offsetY: overlay.offsetY,
          }
        : undefined;

      const textLayer: TextLayer | undefined =
        text && hasTextLayer
          ? {
              text: text.content,
              style: {
                fontSize: text.fontSize,
                fillColor: text.fillColor,
                outlineColor: text.outlineColor,
                outlineWidth: text.outlineWidth,
              },
              position: text.position,
              offsetX: text.offsetX,
              offsetY: text.offsetY,
            }
          : undefined;

      const output = await processImage({
        input: media.bytes,
        overlay: overlayLayer,
        text: textLayer,
        maxBytes,
        config: this.config,
      });

      if (overlayLayer) applied.push('image-overlay');
      if (textLayer) applied.push('image-text');
      if (output.resized) applied.push('image-resize');
      endTimer({ status: 'ok' });

      return {
        bytes: output.bytes,
        kind: 'image',
        filename: withExtension(media.filename, output.format === 'jpeg' ? 'jpg' : output.format),
        mimeType: MIME_TYPES[output.format],
      };
    } catch (error) {
      endTimer({ status: 'error' });
      this.stats?.recordError('transform');
      this.logger.warn('Image transform failed, forwarding original', {
        action: 'transform_fallback',
        filename: media.filename,
        bytes: media.bytes.length,
        error: error instanceof Error ? error.message : String(error),
      });
      return media;
    }
  }
}
