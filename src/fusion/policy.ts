/**
 * Fusion Policy
 *
 * Every weight and threshold the fusion engine uses. The tie band and the
 * dominance ratio are empirical defaults, not calibrated values.
 */

export interface QualityWeights {
  length: number;
  diversity: number;
  cjk: number;
  structure: number;
}

export interface FusionPolicy {
  /** Composite score weights */
  confidenceWeight: number;
  lengthWeight: number;
  qualityWeight: number;
  /** Text length at which the length term saturates */
  lengthNorm: number;

  quality: QualityWeights;
  /** Length cap for the quality length term */
  qualityLengthCap: number;
  /** Distinct characters at which diversity saturates */
  diversityCap: number;
  /** CJK ratio multiplier before capping at 1 */
  cjkMultiplier: number;
  /** Digit/punctuation count at which structure saturates */
  structureCap: number;

  /** Scores closer than this are merged line by line */
  tieBand: number;
  /** Primary longer than this multiple of secondary stands alone */
  dominanceRatio: number;

  ocrSupplementMarker: string;
  visionSupplementMarker: string;
}

export const DEFAULT_FUSION_POLICY: FusionPolicy = {
  confidenceWeight: 0.4,
  lengthWeight: 0.3,
  qualityWeight: 0.3,
  lengthNorm: 100,

  quality: {
    length: 0.3,
    diversity: 0.2,
    cjk: 0.3,
    structure: 0.2,
  },
  qualityLengthCap: 200,
  diversityCap: 50,
  cjkMultiplier: 2,
  structureCap: 20,

  tieBand: 0.1,
  dominanceRatio: 1.5,

  ocrSupplementMarker: '[OCR supplement]',
  visionSupplementMarker: '[Vision supplement]',
};

/** Overlay a partial policy (e.g. from a config file) on the defaults. */
export function resolveFusionPolicy(overrides?: Partial<FusionPolicy>): FusionPolicy {
  if (!overrides) return DEFAULT_FUSION_POLICY;
  return {
    ...DEFAULT_FUSION_POLICY,
    ...overrides,
    quality: { ...DEFAULT_FUSION_POLICY.quality, ...overrides.quality },
  };
}
