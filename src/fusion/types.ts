import type { RecognitionResult } from '../recognition/adapter.js';

export type FusionMethod =
  | 'OCR_ONLY'
  | 'VISION_ONLY'
  | 'INTELLIGENT_MERGE'
  | 'OCR_ENHANCED'
  | 'VISION_ENHANCED'
  | 'BOTH_FAILED';

export interface FusionOutcome {
  finalText: string;
  method: FusionMethod;
  ocrConfidence?: number;
  visionConfidence?: number;
  /** Composite scores, present only when both channels succeeded */
  ocrScore?: number;
  visionScore?: number;
}

/** A channel that was not attempted is `null`, distinct from a failed attempt. */
export interface ChannelResults {
  ocr: RecognitionResult | null;
  vision: RecognitionResult | null;
}
