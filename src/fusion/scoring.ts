/**
 * Candidate scoring for the fusion engine.
 *
 * quality() proxies for "looks like real structured text": enough length,
 * varied characters, on-script CJK content and digits/punctuation.
 */

import { charLength } from '../content/classifier.js';
import { DEFAULT_FUSION_POLICY } from './policy.js';
import type { FusionPolicy } from './policy.js';

// CJK Unified Ideographs: U+4E00–U+9FFF
const CJK_PATTERN = /[\u4E00-\u9FFF]/g;
const STRUCTURE_CHARS = new Set('.,;:!?()[]{}');

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function textQuality(text: string, policy: FusionPolicy = DEFAULT_FUSION_POLICY): number {
  if (text.trim() === '') return 0;

  const chars = Array.from(text);
  const length = chars.length;

  const lengthScore = Math.min(length / policy.qualityLengthCap, 1);
  const diversityScore = Math.min(new Set(chars).size / policy.diversityCap, 1);

  const cjkCount = (text.match(CJK_PATTERN) ?? []).length;
  const cjkScore = Math.min((cjkCount / length) * policy.cjkMultiplier, 1);

  const structureCount = chars.filter((ch) => isDigit(ch) || STRUCTURE_CHARS.has(ch)).length;
  const structureScore = Math.min(structureCount / policy.structureCap, 1);

  const { quality } = policy;
  const score =
    lengthScore * quality.length +
    diversityScore * quality.diversity +
    cjkScore * quality.cjk +
    structureScore * quality.structure;

  return Math.min(score, 1);
}

/** Weighted blend of self-reported confidence, length and text quality. */
export function compositeScore(
  text: string,
  confidence: number,
  policy: FusionPolicy = DEFAULT_FUSION_POLICY
): number {
  const clamped = Number.isFinite(confidence) ? Math.min(Math.max(confidence, 0), 1) : 0;
  return (
    clamped * policy.confidenceWeight +
    Math.min(charLength(text) / policy.lengthNorm, 1) * policy.lengthWeight +
    textQuality(text, policy) * policy.qualityWeight
  );
}
