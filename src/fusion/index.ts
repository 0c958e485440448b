export { FusionEngine, mergeLines } from './fusion-engine.js';
export { compositeScore, textQuality } from './scoring.js';
export { DEFAULT_FUSION_POLICY, resolveFusionPolicy } from './policy.js';
export type { FusionPolicy, QualityWeights } from './policy.js';
export type { FusionMethod, FusionOutcome, ChannelResults } from './types.js';
