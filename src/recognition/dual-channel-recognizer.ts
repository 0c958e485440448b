/**
 * Dual-Channel Recognizer
 *
 * Runs the OCR and vision adapters against one image concurrently, each
 * under its own timeout, and collects whatever completes. A channel that is
 * switched off, missing or unavailable yields `null` (not attempted); a
 * channel that errors or times out yields a failed RecognitionResult.
 * One attempt per channel; retries belong to the adapters.
 */

import { RecognitionTimeoutError } from '../errors/docfusion-error.js';
import { WorkerPool } from '../performance/worker-pool.js';
import type { ChannelResults } from '../fusion/types.js';
import { failedResult } from './adapter.js';
import type { RecognitionAdapter, RecognitionResult, RecognizeOptions } from './adapter.js';

export const DEFAULT_OCR_TIMEOUT_MS = 30_000;
export const DEFAULT_VISION_TIMEOUT_MS = 60_000;

export interface ChannelAdapters {
  ocr?: RecognitionAdapter;
  vision?: RecognitionAdapter;
}

export interface ChannelFlags {
  useOcr: boolean;
  useVision: boolean;
}

export interface DualChannelOptions {
  ocrTimeoutMs?: number;
  visionTimeoutMs?: number;
  /** Shared pool for recognition calls. Default: a private pool of 2 slots */
  pool?: WorkerPool;
}

export class DualChannelRecognizer {
  private readonly ocrTimeoutMs: number;
  private readonly visionTimeoutMs: number;
  private readonly pool: WorkerPool;

  constructor(
    private readonly adapters: ChannelAdapters,
    options: DualChannelOptions = {}
  ) {
    this.ocrTimeoutMs = options.ocrTimeoutMs ?? DEFAULT_OCR_TIMEOUT_MS;
    this.visionTimeoutMs = options.visionTimeoutMs ?? DEFAULT_VISION_TIMEOUT_MS;
    this.pool = options.pool ?? new WorkerPool(2);
  }

  async recognize(
    image: Uint8Array,
    flags: ChannelFlags,
    options?: RecognizeOptions
  ): Promise<ChannelResults> {
    const ocrAdapter = this.enabledAdapter(this.adapters.ocr, flags.useOcr, 'ocr');
    const visionAdapter = this.enabledAdapter(this.adapters.vision, flags.useVision, 'vision');

    // Start both before awaiting either
    const ocrTask = ocrAdapter
      ? this.runChannel(ocrAdapter, image, this.ocrTimeoutMs, options)
      : Promise.resolve(null);
    const visionTask = visionAdapter
      ? this.runChannel(visionAdapter, image, this.visionTimeoutMs, options)
      : Promise.resolve(null);

    const [ocr, vision] = await Promise.all([ocrTask, visionTask]);
    return { ocr, vision };
  }

  private enabledAdapter(
    adapter: RecognitionAdapter | undefined,
    enabled: boolean,
    channel: 'ocr' | 'vision'
  ): RecognitionAdapter | undefined {
    if (!enabled || !adapter) return undefined;
    if (!adapter.isAvailable()) {
      console.warn(`[docfusion:recognizer] ${channel} adapter '${adapter.engineId}' is not available; channel skipped`);
      return undefined;
    }
    return adapter;
  }

  private async runChannel(
    adapter: RecognitionAdapter,
    image: Uint8Array,
    timeoutMs: number,
    options?: RecognizeOptions
  ): Promise<RecognitionResult> {
    const start = Date.now();
    try {
      return await this.pool.run(() => adapter.recognize(image, options), {
        timeoutMs,
        label: adapter.engineId,
      });
    } catch (err) {
      const durationMs = Date.now() - start;
      if (err instanceof RecognitionTimeoutError) {
        console.warn(`[docfusion:recognizer] ${adapter.engineId} timed out`, { timeoutMs });
        return failedResult(adapter.engineId, 'timeout', durationMs);
      }
      // Adapters should not reject; record it the same way as a reported failure
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[docfusion:recognizer] ${adapter.engineId} failed`, { error: message });
      return failedResult(adapter.engineId, message, durationMs);
    }
  }
}
