/**
 * Vision image preparation
 *
 * Vision APIs take PNG, JPEG, GIF and WebP up to a bounded size. Images in
 * those formats that fit within MAX_VISION_EDGE pass through untouched;
 * anything else (TIFF, oversized scans) is flattened to RGB, scaled down to
 * fit and re-encoded as PNG.
 */

import sharp from 'sharp';
import { detectImageMimeType } from './image-format.js';
import type { ImageMimeType } from './image-format.js';

/** Longest edge, in pixels, sent to a vision model */
export const MAX_VISION_EDGE = 2048;

export interface PreparedImage {
  data: Buffer;
  mimeType: ImageMimeType;
}

export async function prepareForVision(image: Uint8Array, maxEdge: number = MAX_VISION_EDGE): Promise<PreparedImage> {
  const input = Buffer.from(image);
  const mimeType = detectImageMimeType(image);
  const { width = 0, height = 0 } = await sharp(input).metadata();

  if (mimeType && Math.max(width, height) <= maxEdge) {
    return { data: input, mimeType };
  }

  const data = await sharp(input)
    .flatten({ background: '#ffffff' })
    .resize({ width: maxEdge, height: maxEdge, fit: 'inside', withoutEnlargement: true })
    .png()
    .toBuffer();
  return { data, mimeType: 'image/png' };
}
