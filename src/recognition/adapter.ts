/**
 * Recognition Adapter contract
 *
 * Uniform capability over OCR engines and vision-language models:
 * "recognize an image and report confidence". Implementations must resolve,
 * never reject: failures come back as `success: false`.
 */

export type AdapterKind = 'ocr' | 'vision';

export interface RecognizeOptions {
  /** Language hint, engine specific (e.g. 'eng+chi_sim' for Tesseract) */
  language?: string;
  /** Override the transcription prompt (vision adapters only) */
  prompt?: string;
}

export interface RecognitionResult {
  /** Opaque engine identifier, for logging and statistics */
  engineId: string;
  text: string;
  /** 0.0–1.0 */
  confidence: number;
  success: boolean;
  error?: string;
  durationMs?: number;
}

export interface RecognitionAdapter {
  readonly engineId: string;
  readonly kind: AdapterKind;
  /** False when the adapter lacks credentials or its engine cannot run */
  isAvailable(): boolean;
  recognize(image: Uint8Array, options?: RecognizeOptions): Promise<RecognitionResult>;
  /** Release engine resources (workers, sockets) */
  terminate?(): Promise<void>;
}

export function failedResult(engineId: string, error: string, durationMs?: number): RecognitionResult {
  return { engineId, text: '', confidence: 0, success: false, error, durationMs };
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}
