/**
 * Text Sanitizer
 *
 * Turns fused recognition output into user-facing text: removes failure
 * markers, "no visible text" boilerplate and internal annotations, then
 * filters degenerate lines. Returns '' when nothing usable remains.
 */

import { charLength } from '../content/classifier.js';

export interface SanitizerOptions {
  /** Lines shorter than this are dropped. Default: 3 */
  minLineLength?: number;
  /** A line of one token repeated more than this many times is dropped. Default: 2 */
  maxSingleTokenRepeats?: number;
  /** Repetition check applies above this many tokens. Default: 10 */
  repetitionMinTokens?: number;
  /** Share of all tokens one token may hold before the text is discarded. Default: 0.3 */
  repetitionMaxShare?: number;
  /** Extra drop-list patterns, matched against each trimmed line */
  extraPatterns?: RegExp[];
}

/**
 * Lines matching any of these never reach the caller. Matched against the
 * trimmed line.
 */
export const DROP_PATTERNS: readonly RegExp[] = [
  // failure markers
  /^\[processing failed\b.*$/i,
  /^\[[^\]]*\b(failed|failure|error|exception)\b[^\]]*\].*$/i,
  /^\[[^\]]*(处理失败|识别失败|处理异常|融合决策失败)[^\]]*\].*$/,
  /^(OCR|Vision|Qwen-VL)\s*:.*(not executed|未执行).*$/i,
  // internal method-tag annotations
  /^\[(OCR|Vision) supplement\]$/i,
  /^\[image text\]$/i,
  /^\[[^\]]*\b(recognition|extraction) results?\b[^\]]*\].*$/i,
  /^\[[^\]]*(识别结果|补充信息|增强结果|补充)[^\]]*\].*$/,
  // "no visible text" boilerplate
  /^(there is |there are )?no (visible|readable|legible) text\b.*$/i,
  /^(the )?image (contains|has) no (visible |readable )?text\b.*$/i,
  /^图中没有可见文字.*$/,
  /^图中(所有)?(可见)?文字[:：]?$/,
  /^无$/,
];

// Only digits, punctuation, symbols and whitespace
const NON_INFORMATIVE_LINE = /^[\p{N}\p{P}\p{S}\s]+$/u;

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

export class TextSanitizer {
  private readonly minLineLength: number;
  private readonly maxSingleTokenRepeats: number;
  private readonly repetitionMinTokens: number;
  private readonly repetitionMaxShare: number;
  private readonly patterns: readonly RegExp[];

  constructor(options: SanitizerOptions = {}) {
    this.minLineLength = options.minLineLength ?? 3;
    this.maxSingleTokenRepeats = options.maxSingleTokenRepeats ?? 2;
    this.repetitionMinTokens = options.repetitionMinTokens ?? 10;
    this.repetitionMaxShare = options.repetitionMaxShare ?? 0.3;
    this.patterns = [...DROP_PATTERNS, ...(options.extraPatterns ?? [])];
  }

  sanitize(text: string): string {
    if (!text || text.trim() === '') return '';

    const kept: string[] = [];
    const seen = new Set<string>();

    for (const raw of text.split('\n')) {
      const line = raw.trim();
      if (line === '') continue;
      if (this.isDropListed(line)) continue;
      if (charLength(line) < this.minLineLength) continue;
      if (NON_INFORMATIVE_LINE.test(line)) continue;
      if (this.isSingleTokenRepeat(line)) continue;
      if (seen.has(line)) continue;
      seen.add(line);
      kept.push(line);
    }

    // The repetition check runs on deduplicated lines so that a second
    // pass over the output sees the same token counts.
    if (this.isDegenerateRepetition(kept)) return '';

    return kept.join('\n');
  }

  isDropListed(line: string): boolean {
    return this.patterns.some((pattern) => pattern.test(line));
  }

  private isSingleTokenRepeat(line: string): boolean {
    const tokens = tokenize(line);
    return tokens.length > this.maxSingleTokenRepeats && new Set(tokens).size === 1;
  }

  private isDegenerateRepetition(lines: string[]): boolean {
    const tokens = tokenize(lines.join(' '));
    if (tokens.length <= this.repetitionMinTokens) return false;

    const counts = new Map<string, number>();
    let max = 0;
    for (const token of tokens) {
      const count = (counts.get(token) ?? 0) + 1;
      counts.set(token, count);
      if (count > max) max = count;
    }
    return max / tokens.length > this.repetitionMaxShare;
  }
}

const defaultSanitizer = new TextSanitizer();

export function sanitizeText(text: string): string {
  return defaultSanitizer.sanitize(text);
}
