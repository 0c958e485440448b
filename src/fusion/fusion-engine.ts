/**
 * Fusion Decision Engine
 *
 * Given the OCR and vision results for one image, selects one, merges both,
 * or reports that neither produced text.
 *
 *   ocr ok | vision ok | outcome
 *   -------+-----------+---------------------------
 *   yes    | yes       | intelligent merge (scored)
 *   yes    | no        | OCR_ONLY
 *   no     | yes       | VISION_ONLY
 *   no     | no        | BOTH_FAILED
 */

import { charLength } from '../content/classifier.js';
import type { RecognitionResult } from '../recognition/adapter.js';
import { DEFAULT_FUSION_POLICY } from './policy.js';
import type { FusionPolicy } from './policy.js';
import { compositeScore } from './scoring.js';
import type { ChannelResults, FusionOutcome } from './types.js';

function succeeded(result: RecognitionResult | null): result is RecognitionResult {
  return result !== null && result.success;
}

/** Non-empty trimmed lines of both texts, first-seen order, exact repeats removed. */
export function mergeLines(first: string, second: string): string {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const raw of [...first.split('\n'), ...second.split('\n')]) {
    const line = raw.trim();
    if (line === '' || seen.has(line)) continue;
    seen.add(line);
    merged.push(line);
  }
  return merged.join('\n');
}

export class FusionEngine {
  constructor(private readonly policy: FusionPolicy = DEFAULT_FUSION_POLICY) {}

  fuse({ ocr, vision }: ChannelResults): FusionOutcome {
    if (succeeded(ocr) && succeeded(vision)) {
      return this.intelligentMerge(ocr, vision);
    }
    if (succeeded(ocr)) {
      return { finalText: ocr.text, method: 'OCR_ONLY', ocrConfidence: ocr.confidence };
    }
    if (succeeded(vision)) {
      return { finalText: vision.text, method: 'VISION_ONLY', visionConfidence: vision.confidence };
    }
    return { finalText: '', method: 'BOTH_FAILED' };
  }

  /**
   * Both channels succeeded. Close scores merge line by line; otherwise the
   * higher-scoring text leads and the other is appended as a marked
   * supplement unless the leader already dominates it in length.
   */
  intelligentMerge(ocr: RecognitionResult, vision: RecognitionResult): FusionOutcome {
    const ocrText = ocr.text.trim();
    const visionText = vision.text.trim();

    const ocrScore = compositeScore(ocrText, ocr.confidence, this.policy);
    const visionScore = compositeScore(visionText, vision.confidence, this.policy);

    const base = {
      ocrConfidence: ocr.confidence,
      visionConfidence: vision.confidence,
      ocrScore,
      visionScore,
    };

    if (Math.abs(ocrScore - visionScore) < this.policy.tieBand) {
      return { ...base, finalText: mergeLines(ocrText, visionText), method: 'INTELLIGENT_MERGE' };
    }

    if (ocrScore > visionScore) {
      return {
        ...base,
        finalText: this.enhance(ocrText, visionText, this.policy.visionSupplementMarker),
        method: 'OCR_ENHANCED',
      };
    }

    return {
      ...base,
      finalText: this.enhance(visionText, ocrText, this.policy.ocrSupplementMarker),
      method: 'VISION_ENHANCED',
    };
  }

  private enhance(primary: string, secondary: string, marker: string): string {
    if (secondary === '') return primary;
    if (charLength(primary) > charLength(secondary) * this.policy.dominanceRatio) {
      return primary;
    }
    return `${primary}\n\n${marker}\n${secondary}`;
  }
}
