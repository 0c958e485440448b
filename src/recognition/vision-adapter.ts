/**
 * Vision Adapter
 *
 * Recognition adapter backed by a vision-language model. Vision models do
 * not report a confidence, so every successful call carries the configured
 * default. An empty transcription is still a success. Images are
 * normalised by prepareForVision before they are sent.
 */

import { ErrorHandler } from '../errors/error-handler.js';
import type { VisionProviderRegistry } from '../ai/provider-registry.js';
import type { VisionProviderChoice } from '../ai/provider.js';
import { clampConfidence, failedResult } from './adapter.js';
import type { AdapterKind, RecognitionAdapter, RecognitionResult, RecognizeOptions } from './adapter.js';
import { prepareForVision } from './image-preprocess.js';

export interface VisionAdapterOptions {
  provider?: VisionProviderChoice;
  /** Reported for every successful transcription. Default: 1.0 */
  defaultConfidence?: number;
  maxTokens?: number;
}

export class VisionAdapter implements RecognitionAdapter {
  readonly kind: AdapterKind = 'vision';
  private readonly provider: VisionProviderChoice;
  private readonly defaultConfidence: number;
  private readonly maxTokens?: number;

  constructor(
    private readonly registry: VisionProviderRegistry,
    options: VisionAdapterOptions = {}
  ) {
    this.provider = options.provider ?? 'auto';
    this.defaultConfidence = clampConfidence(options.defaultConfidence ?? 1.0);
    this.maxTokens = options.maxTokens;
  }

  get engineId(): string {
    const selected = this.registry.select(this.provider);
    return `vision:${selected?.name ?? this.provider}`;
  }

  isAvailable(): boolean {
    return this.registry.select(this.provider) !== undefined;
  }

  async recognize(image: Uint8Array, options?: RecognizeOptions): Promise<RecognitionResult> {
    const start = Date.now();
    const engineId = this.engineId;

    const { data, error } = await ErrorHandler.wrap(async () => {
      const prepared = await prepareForVision(image);
      return this.registry.transcribe(
        {
          imageData: prepared.data,
          mimeType: prepared.mimeType,
          prompt: options?.prompt,
          maxTokens: this.maxTokens,
        },
        this.provider
      );
    }, { engineId });

    const durationMs = Date.now() - start;
    if (error) {
      return failedResult(engineId, `Vision recognition failed: ${error.message}`, durationMs);
    }

    return {
      engineId: `vision:${data.provider}`,
      text: data.content,
      confidence: this.defaultConfidence,
      success: true,
      durationMs,
    };
  }
}
