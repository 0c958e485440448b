export { classifyUnit, determineContentType, charLength, isImagePayload, DEFAULT_MIN_TEXT_LENGTH } from './classifier.js';
export type { ClassifierOptions } from './classifier.js';
export type {
  ContentUnit,
  UnitGeometry,
  ContentType,
  ContentClassification,
  UnitContentType,
  ExtractionMethod,
  UnitResult,
  DocumentStatistics,
  DocumentResult,
} from './types.js';
