/**
 * Document Extractor
 *
 * Entry point of the pipeline. Runs every unit of a document through the
 * unit processor on a shared bounded pool, keeps results in input order and
 * assembles the full text and statistics.
 *
 * Usage:
 *   const extractor = DocumentExtractor.fromConfig(config);
 *   const result = await extractor.process(units, { useOcr: true, useVision: true });
 *   await extractor.close();
 */

import { AnthropicProvider } from '../ai/anthropic-provider.js';
import { OpenAIProvider } from '../ai/openai-provider.js';
import { VisionProviderRegistry } from '../ai/provider-registry.js';
import type { DocFusionConfig } from '../config/config.js';
import type {
  ContentUnit,
  DocumentResult,
  DocumentStatistics,
  ExtractionMethod,
  UnitContentType,
  UnitResult,
} from '../content/types.js';
import { DEFAULT_MIN_TEXT_LENGTH, charLength } from '../content/classifier.js';
import { FusionEngine } from '../fusion/fusion-engine.js';
import { resolveFusionPolicy } from '../fusion/policy.js';
import type { FusionPolicy } from '../fusion/policy.js';
import type { FusionMethod } from '../fusion/types.js';
import { loadUnitsFromFiles } from '../input/file-loader.js';
import { WorkerPool } from '../performance/worker-pool.js';
import { BaiduOcrAdapter } from '../recognition/baidu-ocr-adapter.js';
import {
  DEFAULT_OCR_TIMEOUT_MS,
  DEFAULT_VISION_TIMEOUT_MS,
  DualChannelRecognizer,
} from '../recognition/dual-channel-recognizer.js';
import type { ChannelAdapters, ChannelFlags } from '../recognition/dual-channel-recognizer.js';
import type { RecognitionAdapter, RecognizeOptions } from '../recognition/adapter.js';
import { TesseractAdapter } from '../recognition/tesseract-adapter.js';
import { VisionAdapter } from '../recognition/vision-adapter.js';
import { TextSanitizer } from '../sanitize/text-sanitizer.js';
import type { SanitizerOptions } from '../sanitize/text-sanitizer.js';
import { UnitProcessor } from './unit-processor.js';

export const UNIT_SEPARATOR = '\n\n';

export interface DocumentExtractorOptions {
  adapters: ChannelAdapters;
  fusion?: Partial<FusionPolicy>;
  sanitizer?: SanitizerOptions;
  minTextLength?: number;
  ocrTimeoutMs?: number;
  visionTimeoutMs?: number;
  /** Units in flight at once. Default: 4 */
  unitConcurrency?: number;
  /** Recognition calls in flight at once, across all units. Default: 4 */
  recognitionConcurrency?: number;
  recognizeOptions?: RecognizeOptions;
}

export function computeStatistics(units: readonly UnitResult[], durationMs: number): DocumentStatistics {
  const byContentType: Record<UnitContentType, number> = {
    NATIVE_TEXT_ONLY: 0,
    MIXED: 0,
    IMAGE_ONLY: 0,
    EMPTY: 0,
    ERROR: 0,
  };
  const byExtractionMethod: Record<ExtractionMethod, number> = {
    native_text: 0,
    image_pipeline: 0,
    mixed_pipeline: 0,
    empty: 0,
    error: 0,
  };
  const byFusionMethod: Record<FusionMethod, number> = {
    OCR_ONLY: 0,
    VISION_ONLY: 0,
    INTELLIGENT_MERGE: 0,
    OCR_ENHANCED: 0,
    VISION_ENHANCED: 0,
    BOTH_FAILED: 0,
  };
  let imagesProcessed = 0;
  let charactersExtracted = 0;

  for (const unit of units) {
    byContentType[unit.contentType]++;
    byExtractionMethod[unit.extractionMethod]++;
    for (const fusion of unit.fusions) {
      byFusionMethod[fusion.method]++;
    }
    imagesProcessed += unit.fusions.length;
    if (unit.contentType !== 'ERROR') {
      charactersExtracted += charLength(unit.finalText);
    }
  }

  return {
    totalUnits: units.length,
    byContentType,
    byExtractionMethod,
    byFusionMethod,
    imagesProcessed,
    charactersExtracted,
    durationMs,
  };
}

/** No unit carried usable native text. Holds for an empty document. */
export function isScannedDocument(units: readonly UnitResult[]): boolean {
  return !units.some((u) => u.contentType === 'NATIVE_TEXT_ONLY' || u.contentType === 'MIXED');
}

export class DocumentExtractor {
  private readonly adapters: ChannelAdapters;
  private readonly unitPool: WorkerPool;
  private readonly processor: UnitProcessor;

  constructor(options: DocumentExtractorOptions) {
    this.adapters = options.adapters;
    this.unitPool = new WorkerPool(options.unitConcurrency ?? 4);

    const recognizer = new DualChannelRecognizer(options.adapters, {
      ocrTimeoutMs: options.ocrTimeoutMs ?? DEFAULT_OCR_TIMEOUT_MS,
      visionTimeoutMs: options.visionTimeoutMs ?? DEFAULT_VISION_TIMEOUT_MS,
      pool: new WorkerPool(options.recognitionConcurrency ?? 4),
    });

    this.processor = new UnitProcessor({
      recognizer,
      fusion: new FusionEngine(resolveFusionPolicy(options.fusion)),
      sanitizer: new TextSanitizer(options.sanitizer),
      minTextLength: options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH,
      recognizeOptions: options.recognizeOptions,
    });
  }

  /**
   * Build adapters from configuration: the configured OCR engine, and a
   * vision adapter over every provider that has a key.
   */
  static fromConfig(config: DocFusionConfig): DocumentExtractor {
    const ocr: RecognitionAdapter =
      config.ocr.engine === 'baidu'
        ? new BaiduOcrAdapter({
            apiKey: config.ocr.baiduApiKey,
            secretKey: config.ocr.baiduSecretKey,
            method: config.ocr.baiduMethod,
            timeoutMs: config.pipeline.ocrTimeoutMs,
          })
        : new TesseractAdapter({
            language: config.ocr.language,
            workers: config.pipeline.recognitionConcurrency,
            dataDir: config.ocr.dataDir,
          });

    const registry = new VisionProviderRegistry();
    const providerOptions = {
      model: config.vision.model,
      maxTokens: config.vision.maxTokens,
      timeoutMs: config.pipeline.visionTimeoutMs,
    };
    if (config.vision.openaiApiKey) {
      registry.register(new OpenAIProvider({ ...providerOptions, apiKey: config.vision.openaiApiKey }));
    }
    if (config.vision.anthropicApiKey) {
      registry.register(new AnthropicProvider({ ...providerOptions, apiKey: config.vision.anthropicApiKey }));
    }

    const vision = new VisionAdapter(registry, {
      provider: config.vision.provider,
      defaultConfidence: config.vision.defaultConfidence,
      maxTokens: config.vision.maxTokens,
    });

    return new DocumentExtractor({
      adapters: { ocr, vision },
      fusion: config.fusion,
      minTextLength: config.pipeline.minTextLength,
      ocrTimeoutMs: config.pipeline.ocrTimeoutMs,
      visionTimeoutMs: config.pipeline.visionTimeoutMs,
      unitConcurrency: config.pipeline.unitConcurrency,
      recognitionConcurrency: config.pipeline.recognitionConcurrency,
    });
  }

  async process(units: readonly ContentUnit[], flags: ChannelFlags): Promise<DocumentResult> {
    const start = Date.now();

    const results = await this.unitPool.map(units, (unit) => this.processor.process(unit, flags));

    const statistics = computeStatistics(results, Date.now() - start);
    // One entry per unit, empty ones included
    const fullText = results.map((r) => r.finalText).join(UNIT_SEPARATOR);
    const isScanned = isScannedDocument(results);

    console.info('[docfusion:extractor] document processed', {
      units: statistics.totalUnits,
      images: statistics.imagesProcessed,
      errors: statistics.byContentType.ERROR,
      isScanned,
      durationMs: statistics.durationMs,
    });

    return { units: results, fullText, statistics, isScanned };
  }

  /** Load image and text files as units, then process them as one document. */
  async processFiles(paths: readonly string[], flags: ChannelFlags): Promise<DocumentResult> {
    const units = await loadUnitsFromFiles(paths);
    return this.process(units, flags);
  }

  /** Release adapter resources. The extractor must not be used afterwards. */
  async close(): Promise<void> {
    const adapters = [this.adapters.ocr, this.adapters.vision];
    await Promise.all(adapters.map((adapter) => adapter?.terminate?.()));
  }
}
