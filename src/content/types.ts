/**
 * Content model shared by the classifier, the unit processor and the
 * document extractor.
 */

import type { FusionMethod, FusionOutcome } from '../fusion/types.js';

export interface UnitGeometry {
  width: number;
  height: number;
  rotation?: number;
}

/**
 * One page (document context) or one standalone image (image context).
 * Produced by a format parser; treated as read-only by the pipeline.
 */
export interface ContentUnit {
  /** Unique within the document */
  id: string;
  /** 0-based ordinal position */
  position: number;
  /** Text already present in the source, possibly empty */
  nativeText: string;
  /** Embedded image payloads (PNG, JPEG, GIF or WebP bytes) */
  images: Uint8Array[];
  /** Passed through untouched */
  geometry?: UnitGeometry;
  /** Originating file or page label, for display */
  source?: string;
}

export type ContentType = 'NATIVE_TEXT_ONLY' | 'MIXED' | 'IMAGE_ONLY' | 'EMPTY';

export interface ContentClassification {
  hasNativeText: boolean;
  hasImages: boolean;
  nativeTextLength: number;
  imageCount: number;
  contentType: ContentType;
}

export type UnitContentType = ContentType | 'ERROR';

export type ExtractionMethod =
  | 'native_text'
  | 'image_pipeline'
  | 'mixed_pipeline'
  | 'empty'
  | 'error';

export interface UnitResult {
  unitId: string;
  position: number;
  finalText: string;
  contentType: UnitContentType;
  extractionMethod: ExtractionMethod;
  imageCount: number;
  /** One entry per embedded image that went through recognition */
  fusions: FusionOutcome[];
  error?: string;
  durationMs: number;
}

export interface DocumentStatistics {
  totalUnits: number;
  byContentType: Record<UnitContentType, number>;
  byExtractionMethod: Record<ExtractionMethod, number>;
  byFusionMethod: Record<FusionMethod, number>;
  imagesProcessed: number;
  charactersExtracted: number;
  durationMs: number;
}

export interface DocumentResult {
  /** Same order and length as the input units */
  units: UnitResult[];
  /** Unit texts joined by a blank line */
  fullText: string;
  statistics: DocumentStatistics;
  /** True when no unit carried usable native text */
  isScanned: boolean;
}
