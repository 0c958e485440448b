/**
 * Unit Processor
 *
 * Per-unit state machine:
 *
 *   CLASSIFY → NATIVE_EXTRACT | IMAGE_PIPELINE | MIXED_PIPELINE | EMPTY → SANITIZE → DONE
 *
 * ERROR is reachable from every state. A unit never throws out of process();
 * an unexpected failure becomes an ERROR-tagged UnitResult carrying the
 * message as its text.
 */

import { classifyUnit, isImagePayload } from '../content/classifier.js';
import type { ContentUnit, ExtractionMethod, UnitResult } from '../content/types.js';
import { UnitProcessingError } from '../errors/docfusion-error.js';
import type { FusionEngine } from '../fusion/fusion-engine.js';
import type { FusionOutcome } from '../fusion/types.js';
import type { ChannelFlags, DualChannelRecognizer } from '../recognition/dual-channel-recognizer.js';
import type { RecognizeOptions } from '../recognition/adapter.js';
import type { TextSanitizer } from '../sanitize/text-sanitizer.js';

export type UnitState =
  | 'CLASSIFY'
  | 'NATIVE_EXTRACT'
  | 'IMAGE_PIPELINE'
  | 'MIXED_PIPELINE'
  | 'EMPTY'
  | 'SANITIZE'
  | 'DONE'
  | 'ERROR';

export const IMAGE_TEXT_DELIMITER = '[Image text]';

export interface UnitProcessorDeps {
  recognizer: DualChannelRecognizer;
  fusion: FusionEngine;
  sanitizer: TextSanitizer;
  minTextLength?: number;
  recognizeOptions?: RecognizeOptions;
}

interface ImagePipelineOutput {
  text: string;
  fusions: FusionOutcome[];
}

export class UnitProcessor {
  constructor(private readonly deps: UnitProcessorDeps) {}

  async process(unit: ContentUnit, flags: ChannelFlags): Promise<UnitResult> {
    const start = Date.now();
    const unitId = typeof unit?.id === 'string' ? unit.id : '';
    const position = typeof unit?.position === 'number' ? unit.position : -1;
    let state: UnitState = 'CLASSIFY';

    const transition = (next: UnitState): void => {
      console.debug(`[docfusion:unit] ${unitId}: ${state} -> ${next}`);
      state = next;
    };

    try {
      const classification = classifyUnit(unit, { minTextLength: this.deps.minTextLength });
      const base = {
        unitId,
        position,
        contentType: classification.contentType,
        imageCount: classification.imageCount,
      };

      let finalText: string;
      let extractionMethod: ExtractionMethod;
      let fusions: FusionOutcome[] = [];

      switch (classification.contentType) {
        case 'NATIVE_TEXT_ONLY': {
          transition('NATIVE_EXTRACT');
          // Trusted source text: no sanitization
          finalText = unit.nativeText;
          extractionMethod = 'native_text';
          break;
        }
        case 'IMAGE_ONLY': {
          transition('IMAGE_PIPELINE');
          const output = await this.runImagePipeline(unit, flags, () => transition('SANITIZE'));
          finalText = output.text;
          fusions = output.fusions;
          extractionMethod = 'image_pipeline';
          break;
        }
        case 'MIXED': {
          transition('MIXED_PIPELINE');
          const output = await this.runImagePipeline(unit, flags, () => transition('SANITIZE'));
          finalText =
            output.text === '' ? unit.nativeText : `${unit.nativeText}\n\n${IMAGE_TEXT_DELIMITER}\n${output.text}`;
          fusions = output.fusions;
          extractionMethod = 'mixed_pipeline';
          break;
        }
        case 'EMPTY': {
          transition('EMPTY');
          finalText = '';
          extractionMethod = 'empty';
          break;
        }
      }

      transition('DONE');
      return { ...base, finalText, extractionMethod, fusions, durationMs: Date.now() - start };
    } catch (err) {
      const failedIn = state;
      transition('ERROR');
      const message = err instanceof Error ? err.message : String(err);
      const error = new UnitProcessingError(message, { unitId, state: failedIn });
      console.error(`[docfusion:unit] ${unitId} failed in ${failedIn}`, { error: error.message });
      return {
        unitId,
        position,
        finalText: `[Processing failed: ${error.message}]`,
        contentType: 'ERROR',
        extractionMethod: 'error',
        imageCount: 0,
        fusions: [],
        error: error.message,
        durationMs: Date.now() - start,
      };
    }
  }

  /**
   * Recognize → fuse → sanitize, one image at a time. Non-empty outputs are
   * joined by newlines.
   */
  private async runImagePipeline(
    unit: ContentUnit,
    flags: ChannelFlags,
    onSanitize: () => void
  ): Promise<ImagePipelineOutput> {
    const images = unit.images.filter(isImagePayload);
    const fused: FusionOutcome[] = [];

    for (const image of images) {
      const channels = await this.deps.recognizer.recognize(image, flags, this.deps.recognizeOptions);
      fused.push(this.deps.fusion.fuse(channels));
    }

    onSanitize();
    const texts = fused
      .map((outcome) => this.deps.sanitizer.sanitize(outcome.finalText))
      .filter((text) => text !== '');

    return { text: texts.join('\n'), fusions: fused };
  }
}
