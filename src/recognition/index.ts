/**
 * Recognition module
 *
 * Adapter contract, concrete OCR/vision adapters and the dual-channel recognizer.
 */

export { failedResult, clampConfidence } from './adapter.js';
export type { AdapterKind, RecognitionAdapter, RecognitionResult, RecognizeOptions } from './adapter.js';
export { DualChannelRecognizer, DEFAULT_OCR_TIMEOUT_MS, DEFAULT_VISION_TIMEOUT_MS } from './dual-channel-recognizer.js';
export type { ChannelAdapters, ChannelFlags, DualChannelOptions } from './dual-channel-recognizer.js';
export { TesseractAdapter, DEFAULT_TESSERACT_LANGUAGE, DEFAULT_TESSERACT_WORKERS } from './tesseract-adapter.js';
export { stageLanguageData, languageCodes, DEFAULT_TESSDATA_DIR, TESSDATA_VARIANT } from './tesseract-data.js';
export type { PackageResolver } from './tesseract-data.js';
export type { TesseractAdapterOptions } from './tesseract-adapter.js';
export { BaiduOcrAdapter, BAIDU_OCR_METHODS } from './baidu-ocr-adapter.js';
export type { BaiduOcrAdapterOptions, BaiduOcrMethod } from './baidu-ocr-adapter.js';
export { VisionAdapter } from './vision-adapter.js';
export type { VisionAdapterOptions } from './vision-adapter.js';
export { detectImageMimeType } from './image-format.js';
export type { ImageMimeType } from './image-format.js';
export { prepareForVision, MAX_VISION_EDGE } from './image-preprocess.js';
export type { PreparedImage } from './image-preprocess.js';
