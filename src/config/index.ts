export {
  ConfigManager,
  mergeConfig,
  setConfigValue,
  OCR_ENGINES,
  VISION_PROVIDER_CHOICES,
} from './config.js';
export type { DocFusionConfig, PartialDocFusionConfig, OcrEngineName } from './config.js';
