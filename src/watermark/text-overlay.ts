/**
 * @webhook-relay/core - Text Overlay
 *
 * Renders watermark text to a transparent PNG via an SVG document that
 * sharp rasterizes. The outline is eight copies of the text shifted by
 * ±outlineWidth in the neighbouring directions, emitted before the fill.
 */

import sharp from 'sharp';

import type { OverlayAsset } from './overlay-cache.js';

export interface TextStyle {
  fontSize: number;
  fillColor: string;
  outlineColor: string;
  outlineWidth: number;
  fontFamily?: string;
}

/** Neighbour directions used for the outline pass */
export const OUTLINE_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
];

const CHAR_WIDTH_RATIO = 0.6;
const LINE_HEIGHT_RATIO = 1.3;
const PADDING = 4;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export interface TextSvg {
  svg: string;
  width: number;
  height: number;
}

/**
 * Builds the SVG for one line of text. Width is estimated from the glyph
 * count since no font metrics are available before rasterizing.
 */
export function buildTextSvg(text: string, style: TextStyle): TextSvg {
  const line = text.replace(/\s+/g, ' ').trim();
  const stroke = Math.max(0, style.outlineWidth);
  const pad = PADDING + stroke;
  const width = Math.ceil(Array.from(line).length * style.fontSize * CHAR_WIDTH_RATIO) + pad * 2;
  const height = Math.ceil(style.fontSize * LINE_HEIGHT_RATIO) + pad * 2;
  const x = pad;
  const y = pad + style.fontSize;
  const family = escapeXml(style.fontFamily ?? 'DejaVu Sans, Arial, sans-serif');
  const content = escapeXml(line);

  const element = (dx: number, dy: number, color: string): string =>
    `<text x="${x + dx}" y="${y + dy}" font-family="${family}" font-size="${style.fontSize}" ` +
    `font-weight="bold" fill="${escapeXml(color)}">${content}</text>`;

  const layers: string[] = [];
  if (stroke > 0) {
    for (const [dx, dy] of OUTLINE_DIRECTIONS) {
      layers.push(element(dx * stroke, dy * stroke, style.outlineColor));
    }
  }
  layers.push(element(0, 0, style.fillColor));

  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
    layers.join('') +
    '</svg>';

  return { svg, width, height };
}

/**
 * Rasterizes text to an RGBA PNG layer.
 */
export async function renderTextOverlay(text: string, style: TextStyle): Promise<OverlayAsset> {
  const { svg } = buildTextSvg(text, style);
  const { data, info } = await sharp(Buffer.from(svg))
    .ensureAlpha()
    .png()
    .toBuffer({ resolveWithObject: true });

  return { buffer: data, width: info.width, height: info.height };
}
