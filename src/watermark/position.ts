/**
 * @webhook-relay/core - Watermark Position
 *
 * Maps a position enum to the top-left pixel of an asset on a canvas.
 * Shared by text and image overlays.
 */

import type { WatermarkPosition } from '../types/index.js';

export const DEFAULT_MARGIN = 20;

export interface Size {
  width: number;
  height: number;
}

export interface Point {
  left: number;
  top: number;
}

/**
 * Compute where to paste an asset.
 *
 * Non-custom positions keep `margin` pixels from the edges they anchor to;
 * when the asset is too large for that, the point is clamped so the asset
 * stays on the canvas. `custom` returns the given offset verbatim.
 */
export function computePosition(
  canvas: Size,
  asset: Size,
  position: WatermarkPosition,
  custom: Point = { left: 0, top: 0 },
  margin: number = DEFAULT_MARGIN,
): Point {
  const right = canvas.width - asset.width - margin;
  const bottom = canvas.height - asset.height - margin;

  let point: Point;
  switch (position) {
    case 'top-left':
      point = { left: margin, top: margin };
      break;
    case 'top-right':
      point = { left: right, top: margin };
      break;
    case 'bottom-left':
      point = { left: margin, top: bottom };
      break;
    case 'bottom-right':
      point = { left: right, top: bottom };
      break;
    case 'center':
      point = {
        left: Math.floor((canvas.width - asset.width) / 2),
        top: Math.floor((canvas.height - asset.height) / 2),
      };
      break;
    case 'custom':
      return { left: custom.left, top: custom.top };
  }

  return {
    left: clamp(point.left, 0, Math.max(0, canvas.width - asset.width)),
    top: clamp(point.top, 0, Math.max(0, canvas.height - asset.height)),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
