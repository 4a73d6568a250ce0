/**
 * @webhook-relay/core - Transform Engine Tests
 */

import sharp from 'sharp';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import { TESTING } from '../../config/presets.js';
import type { StructuredLogger } from '../../logger/index.js';
import { StatsAggregator } from '../../stats/aggregator.js';
import type { MediaAttachment, TextWatermark, WatermarkConfig } from '../../types/index.js';
import { WatermarkConfigSchema } from '../../validation/schemas.js';
import { applyTextWatermark, TransformEngine } from '../../watermark/engine.js';
import { OverlayCache } from '../../watermark/overlay-cache.js';

const TEXT: TextWatermark = {
  content: '[relayed]',
  prefix: '',
  suffix: '',
  separator: ' ',
  position: 'bottom-right',
  fontSize: 12,
  fillColor: '#FFFFFF',
  outlineColor: '#000000',
  outlineWidth: 1,
  offsetX: 0,
  offsetY: 0,
};

function watermark(input: unknown): WatermarkConfig {
  return WatermarkConfigSchema.parse(input);
}

async function pngAttachment(width = 120, height = 90): Promise<MediaAttachment> {
  const bytes = await sharp({ create: { width, height, channels: 3, background: '#808080' } })
    .png()
    .toBuffer();
  return { bytes, kind: 'image', filename: 'photo.png', mimeType: 'image/png' };
}

function createLogger(): StructuredLogger {
  return { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('applyTextWatermark', () => {
  it('should append content after the separator', () => {
    expect(applyTextWatermark('hello', TEXT)).toBe('hello [relayed]');
  });

  it('should wrap with prefix and suffix', () => {
    expect(applyTextWatermark('hello', { ...TEXT, prefix: '>> ', suffix: ' <<' })).toBe(
      '>> hello [relayed] <<',
    );
  });

  it('should use content alone when there is no source text', () => {
    expect(applyTextWatermark(undefined, TEXT)).toBe('[relayed]');
    expect(applyTextWatermark('', TEXT)).toBe('[relayed]');
  });

  it('should skip the separator when content is empty', () => {
    expect(applyTextWatermark('hello', { ...TEXT, content: '', suffix: '!' })).toBe('hello!');
  });

  it('should return the source when the result would be empty', () => {
    expect(applyTextWatermark(undefined, { ...TEXT, content: '' })).toBeUndefined();
    expect(applyTextWatermark('', { ...TEXT, content: '' })).toBe('');
  });
});

describe('TransformEngine', () => {
  let stats: StatsAggregator;
  let logger: StructuredLogger;
  let logoBytes: Buffer;
  let engine: TransformEngine;

  beforeEach(async () => {
    stats = new StatsAggregator();
    logger = createLogger();
    logoBytes = await sharp({
      create: { width: 16, height: 16, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 1 } },
    })
      .png()
      .toBuffer();
    const overlayCache = new OverlayCache({
      readAsset: (path) =>
        path === 'logo.png' ? Promise.resolve(logoBytes) : Promise.reject(new Error(`no file ${path}`)),
    });
    engine = new TransformEngine({ overlayCache, config: TESTING.transform, logger, stats });
  });

  it('should leave payloads untouched in none mode', async () => {
    const result = await engine.transform({ text: 'hello' }, watermark({ mode: 'none' }));

    expect(result).toEqual({ payload: { text: 'hello' }, watermarked: false, applied: [] });
  });

  it('should watermark message text', async () => {
    const result = await engine.transform(
      { text: 'hello' },
      watermark({ mode: 'text', text: { content: '[relayed]' } }),
    );

    expect(result).toEqual({
      payload: { text: 'hello [relayed]' },
      watermarked: true,
      applied: ['text'],
    });
  });

  it('should pass video through and count it', async () => {
    const media: MediaAttachment = { bytes: Buffer.from([1, 2, 3]), kind: 'video', filename: 'clip.mp4' };

    const result = await engine.transform(
      { media },
      watermark({ mode: 'image-overlay', overlay: { assetPath: 'logo.png' } }),
    );

    expect(result.payload.media).toBe(media);
    expect(result.watermarked).toBe(false);
    expect(stats.snapshot().mediaProcessed.video).toBe(1);
  });

  it('should composite the overlay onto images', async () => {
    const media = await pngAttachment();

    const result = await engine.transform(
      { media },
      watermark({ mode: 'image-overlay', overlay: { assetPath: 'logo.png', scale: 0.25 } }),
    );

    expect(result.applied).toEqual(['image-overlay']);
    expect(result.watermarked).toBe(true);
    expect(result.payload.media).toMatchObject({
      kind: 'image',
      filename: 'photo.png',
      mimeType: 'image/png',
    });
    expect(result.payload.media?.bytes).not.toBe(media.bytes);
    expect(stats.snapshot().mediaProcessed.image).toBe(1);
  });

  it('should draw text on images and watermark the caption', async () => {
    const media = await pngAttachment();

    const result = await engine.transform(
      { text: 'caption', media },
      watermark({ mode: 'text', text: { content: '[relayed]', fontSize: 12 } }),
    );

    expect(result.applied).toEqual(['text', 'image-text']);
    expect(result.payload.text).toBe('caption [relayed]');
  });

  it('should leave images alone when the images toggle is off', async () => {
    const media = await pngAttachment();

    const result = await engine.transform(
      { media },
      watermark({
        mode: 'image-overlay',
        overlay: { assetPath: 'logo.png' },
        media: { images: false },
      }),
    );

    expect(result.payload.media).toBe(media);
    expect(result.applied).toEqual([]);
  });

  it('should shrink images over the destination ceiling without counting a watermark', async () => {
    const bounded = new TransformEngine({
      overlayCache: new OverlayCache({ readAsset: () => Promise.resolve(logoBytes) }),
      config: { ...TESTING.transform, maxWidth: 200, maxHeight: 200 },
      stats,
    });
    const media = await pngAttachment(400, 300);

    const result = await bounded.transform({ media }, watermark({ mode: 'none' }), media.bytes.length - 1);

    expect(result.applied).toEqual(['image-resize']);
    expect(result.watermarked).toBe(false);
    expect(await sharp(result.payload.media?.bytes).metadata()).toMatchObject({ width: 200, height: 150 });
  });

  it('should not report a resize when an image over the ceiling already fits the bounds', async () => {
    const media = await pngAttachment(400, 300);

    const result = await engine.transform({ media }, watermark({ mode: 'none' }), media.bytes.length - 1);

    expect(result.applied).toEqual([]);
    expect(await sharp(result.payload.media?.bytes).metadata()).toMatchObject({ width: 400, height: 300 });
  });

  it('should rename re-encoded jpeg output', async () => {
    const bytes = await sharp({ create: { width: 60, height: 40, channels: 3, background: '#123456' } })
      .gif()
      .toBuffer();
    const media: MediaAttachment = { bytes, kind: 'image', filename: 'anim.gif', mimeType: 'image/gif' };

    const result = await engine.transform(
      { media },
      watermark({ mode: 'image-overlay', overlay: { assetPath: 'logo.png' } }),
    );

    expect(result.payload.media).toMatchObject({ filename: 'anim.jpg', mimeType: 'image/jpeg' });
  });

  it('should forward the original image when it cannot be decoded', async () => {
    const media: MediaAttachment = {
      bytes: Buffer.from('definitely not an image'),
      kind: 'image',
      filename: 'broken.png',
    };

    const result = await engine.transform(
      { text: 'hi', media },
      watermark({ mode: 'both', text: { content: '[relayed]' }, overlay: { assetPath: 'logo.png' } }),
    );

    expect(result.payload.media).toBe(media);
    expect(result.payload.text).toBe('hi [relayed]');
    expect(result.applied).toEqual(['text']);
    expect(stats.snapshot().errorsByStage.transform).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should forward the original image when the overlay is missing', async () => {
    const media = await pngAttachment();

    const result = await engine.transform(
      { media },
      watermark({ mode: 'image-overlay', overlay: { assetPath: 'missing.png' } }),
    );

    expect(result.payload.media).toBe(media);
    expect(result.watermarked).toBe(false);
    expect(stats.snapshot().errors).toBe(1);
  });
});
