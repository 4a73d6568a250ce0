/**
 * @webhook-relay/core - Image Pipeline
 *
 * Decode, optionally downscale, composite overlay and text layers, then
 * re-encode under a byte ceiling. Pure with respect to its inputs; the
 * overlay asset is resolved by the caller.
 */

import sharp, { type OverlayOptions } from 'sharp';

import { ErrorCode } from '../errors/hierarchy.js';
import { RelayError } from '../errors/relay-errors.js';
import type { TransformConfig } from '../types/config.js';
import type { WatermarkPosition } from '../types/index.js';
import type { OverlayAsset } from './overlay-cache.js';
import { computePosition, type Point, type Size } from './position.js';
import { renderTextOverlay, type TextStyle } from './text-overlay.js';

export type OutputFormat = 'jpeg' | 'png' | 'webp';

export interface OverlayLayer {
  asset: OverlayAsset;
  position: WatermarkPosition;
  scale: number;
  opacity: number;
  offsetX: number;
  offsetY: number;
}

export interface TextLayer {
  text: string;
  style: TextStyle;
  position: WatermarkPosition;
  offsetX: number;
  offsetY: number;
}

export interface ImageJob {
  input: Buffer;
  overlay?: OverlayLayer;
  text?: TextLayer;
  /** Output ceiling in bytes */
  maxBytes: number;
  config: TransformConfig;
}

export interface ProcessedImage {
  bytes: Buffer;
  format: OutputFormat;
  /** Quality of the accepted encode; null for PNG */
  quality: number | null;
  width: number;
  height: number;
  resized: boolean;
}

export const MIME_TYPES: Record<OutputFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

/**
 * PNG and WebP inputs keep their format, everything else becomes JPEG
 */
export function chooseOutputFormat(inputFormat: string | undefined): OutputFormat {
  if (inputFormat === 'png' || inputFormat === 'webp') return inputFormat;
  return 'jpeg';
}

/**
 * Quality ladder from baseline down to the floor, floor always included
 */
export function qualityLadder(config: TransformConfig): number[] {
  const ladder: number[] = [];
  for (let q = config.baselineQuality; q > config.minQuality; q -= config.qualityStep) {
    ladder.push(q);
  }
  ladder.push(config.minQuality);
  return ladder;
}

/**
 * @throws {RelayError} ERR_TRANSFORM_FAILED when the input cannot be decoded
 */
export async function processImage(job: ImageJob): Promise<ProcessedImage> {
  let format: string | undefined;
  let source: Size;
  try {
    const metadata = await sharp(job.input).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('missing image dimensions');
    }
    format = metadata.format;
    // EXIF orientations 5 to 8 swap the axes once rotated
    source =
      (metadata.orientation ?? 1) >= 5
        ? { width: metadata.height, height: metadata.width }
        : { width: metadata.width, height: metadata.height };
  } catch (error) {
    throw new RelayError(ErrorCode.ERR_TRANSFORM_FAILED, 'Image could not be decoded', {
      cause: error,
    });
  }

  let pipeline = sharp(job.input).rotate();
  if (job.input.length > job.maxBytes) {
    pipeline = pipeline.resize({
      width: job.config.maxWidth,
      height: job.config.maxHeight,
      fit: 'inside',
      withoutEnlargement: true,
    });
  }

  const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  const canvas: Size = { width: info.width, height: info.height };
  const resized = canvas.width !== source.width || canvas.height !== source.height;

  const layers: OverlayOptions[] = [];
  if (job.overlay) {
    layers.push(await buildOverlayLayer(canvas, job.overlay, job.config.margin));
  }
  if (job.text && job.text.text.trim()) {
    layers.push(await buildTextLayer(canvas, job.text, job.config.margin));
  }

  const raw = { width: canvas.width, height: canvas.height, channels: 4 } as const;
  const composed =
    layers.length > 0
      ? await sharp(data, { raw }).composite(layers).raw().toBuffer()
      : data;

  const outputFormat = chooseOutputFormat(format);
  const encoded = await encodeUnderCeiling(composed, canvas, outputFormat, job);
  return { ...encoded, width: canvas.width, height: canvas.height, resized };
}

async function encodeUnderCeiling(
  composed: Buffer,
  canvas: Size,
  format: OutputFormat,
  job: ImageJob,
): Promise<{ bytes: Buffer; format: OutputFormat; quality: number | null }> {
  const raw = { width: canvas.width, height: canvas.height, channels: 4 } as const;

  if (format === 'png') {
    const png = await sharp(composed, { raw }).png({ compressionLevel: 9 }).toBuffer();
    if (png.length <= job.maxBytes) {
      return { bytes: png, format: 'png', quality: null };
    }
    return await encodeUnderCeiling(composed, canvas, 'jpeg', job);
  }

  let last: { bytes: Buffer; quality: number } | null = null;
  for (const quality of qualityLadder(job.config)) {
    const image = sharp(composed, { raw });
    const bytes =
      format === 'webp'
        ? await image.webp({ quality }).toBuffer()
        : await image.flatten({ background: '#ffffff' }).jpeg({ quality, mozjpeg: true }).toBuffer();
    last = { bytes, quality };
    if (bytes.length <= job.maxBytes) break;
  }

  if (!last) {
    throw new RelayError(ErrorCode.ERR_TRANSFORM_FAILED, 'No quality level to encode with');
  }
  return { bytes: last.bytes, format, quality: last.quality };
}

async function buildOverlayLayer(
  canvas: Size,
  layer: OverlayLayer,
  margin: number,
): Promise<OverlayOptions> {
  const side = Math.max(1, Math.round(layer.scale * Math.min(canvas.width, canvas.height)));
  let image = sharp(layer.asset.buffer).resize({ width: side, height: side, fit: 'inside' }).ensureAlpha();

  if (layer.opacity < 1) {
    const alpha = Math.round(255 * Math.max(0, layer.opacity));
    image = image.composite([
      {
        input: Buffer.from([255, 255, 255, alpha]),
        raw: { width: 1, height: 1, channels: 4 },
        tile: true,
        blend: 'dest-in',
      },
    ]);
  }

  const { data, info } = await image.png().toBuffer({ resolveWithObject: true });
  return place(canvas, { buffer: data, width: info.width, height: info.height }, layer, margin);
}

async function buildTextLayer(canvas: Size, layer: TextLayer, margin: number): Promise<OverlayOptions> {
  let rendered = await renderTextOverlay(layer.text, layer.style);

  if (rendered.width > canvas.width || rendered.height > canvas.height) {
    const { data, info } = await sharp(rendered.buffer)
      .resize({ width: canvas.width, height: canvas.height, fit: 'inside' })
      .png()
      .toBuffer({ resolveWithObject: true });
    rendered = { buffer: data, width: info.width, height: info.height };
  }

  return place(canvas, rendered, layer, margin);
}

function place(
  canvas: Size,
  asset: OverlayAsset,
  layer: { position: WatermarkPosition; offsetX: number; offsetY: number },
  margin: number,
): OverlayOptions {
  const point: Point = computePosition(
    canvas,
    asset,
    layer.position,
    { left: layer.offsetX, top: layer.offsetY },
    margin,
  );

  // composite requires the layer to lie within the canvas
  return {
    input: asset.buffer,
    left: Math.min(Math.max(0, point.left), Math.max(0, canvas.width - asset.width)),
    top: Math.min(Math.max(0, point.top), Math.max(0, canvas.height - asset.height)),
  };
}
