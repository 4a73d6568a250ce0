/**
 * @webhook-relay/core - Media Kind Detection
 *
 * MIME type first, file extension second, document otherwise.
 */

import { extname } from 'path';

import type { MediaKind } from '../types/index.js';

const EXTENSIONS: Record<Exclude<MediaKind, 'document'>, readonly string[]> = {
  image: ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.tiff', '.tif', '.avif'],
  video: ['.mp4', '.avi', '.mov', '.mkv', '.webm', '.flv', '.wmv', '.m4v', '.3gp'],
  audio: ['.mp3', '.wav', '.ogg', '.oga', '.opus', '.flac', '.aac', '.m4a', '.wma'],
};

export function detectMediaKind(mimeType?: string, filename?: string): MediaKind {
  const mime = mimeType?.toLowerCase() ?? '';
  if (mime.startsWith('image/')) return 'image';
  if (mime.startsWith('video/')) return 'video';
  if (mime.startsWith('audio/')) return 'audio';

  const extension = filename ? extname(filename).toLowerCase() : '';
  if (extension) {
    for (const kind of ['image', 'video', 'audio'] as const) {
      if (EXTENSIONS[kind].includes(extension)) return kind;
    }
  }
  return 'document';
}

/**
 * Replaces the extension of a file name, appending one when missing.
 */
export function withExtension(filename: string, extension: string): string {
  const current = extname(filename);
  const base = current ? filename.slice(0, -current.length) : filename;
  return `${base}.${extension}`;
}
