/**
 * Content Classifier
 *
 * Tags a content unit with one of four content types from two signals:
 * whether it carries enough native text, and whether it embeds images.
 */

import type { ContentClassification, ContentType, ContentUnit } from './types.js';

/** Native text must be strictly longer than this (after trimming) to count. */
export const DEFAULT_MIN_TEXT_LENGTH = 10;

export interface ClassifierOptions {
  minTextLength?: number;
}

/** Length in code points, so CJK and astral characters count once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function determineContentType(hasNativeText: boolean, hasImages: boolean): ContentType {
  if (hasNativeText && !hasImages) return 'NATIVE_TEXT_ONLY';
  if (hasNativeText && hasImages) return 'MIXED';
  if (!hasNativeText && hasImages) return 'IMAGE_ONLY';
  return 'EMPTY';
}

export function isImagePayload(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array && value.byteLength > 0;
}

/**
 * Classify a unit. Pure; never throws. Anything malformed degrades
 * towards EMPTY.
 */
export function classifyUnit(
  unit: ContentUnit,
  options: ClassifierOptions = {}
): ContentClassification {
  const minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;

  const rawText: unknown = unit?.nativeText;
  const nativeText = typeof rawText === 'string' ? rawText.trim() : '';
  const nativeTextLength = charLength(nativeText);

  const rawImages: unknown = unit?.images;
  const imageCount = Array.isArray(rawImages) ? rawImages.filter(isImagePayload).length : 0;

  const hasNativeText = nativeTextLength > minTextLength;
  const hasImages = imageCount > 0;

  return {
    hasNativeText,
    hasImages,
    nativeTextLength,
    imageCount,
    contentType: determineContentType(hasNativeText, hasImages),
  };
}
