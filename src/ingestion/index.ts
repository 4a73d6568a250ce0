export { IngestionLoop } from './ingestion-loop.js';
export type { IngestionLoopOptions, IngestionState } from './ingestion-loop.js';
export { DedupWindow } from './dedup.js';
export { EventEmitterSource } from './source.js';
export type { MessageHandler, SourceClient } from './source.js';
