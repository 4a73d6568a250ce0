export { TransformEngine, applyTextWatermark } from './engine.js';
export type { AppliedOperation, TransformEngineOptions, TransformResult } from './engine.js';
export { OverlayCache } from './overlay-cache.js';
export type { OverlayAsset, OverlayCacheOptions } from './overlay-cache.js';
export { computePosition, DEFAULT_MARGIN } from './position.js';
export type { Point, Size } from './position.js';
export { detectMediaKind, withExtension } from './media.js';
export { buildTextSvg, renderTextOverlay, escapeXml, OUTLINE_DIRECTIONS } from './text-overlay.js';
export type { TextStyle, TextSvg } from './text-overlay.js';
export { processImage, chooseOutputFormat, qualityLadder, MIME_TYPES } from './image.js';
export type { ImageJob, OutputFormat, OverlayLayer, ProcessedImage, TextLayer } from './image.js';
