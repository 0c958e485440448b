export { UnitProcessor, IMAGE_TEXT_DELIMITER } from './unit-processor.js';
export type { UnitProcessorDeps, UnitState } from './unit-processor.js';
export {
  DocumentExtractor,
  computeStatistics,
  isScannedDocument,
  UNIT_SEPARATOR,
} from './document-extractor.js';
export type { DocumentExtractorOptions } from './document-extractor.js';
