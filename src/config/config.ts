/**
 * DocFusion Configuration System
 *
 * Manages config file at ~/.docfusion/config.json.
 * Supports environment variable overrides.
 * Validates engine, provider and pipeline settings.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/docfusion-error.js';
import { resolveFusionPolicy } from '../fusion/policy.js';
import type { FusionPolicy } from '../fusion/policy.js';
import { BAIDU_OCR_METHODS } from '../recognition/baidu-ocr-adapter.js';
import type { BaiduOcrMethod } from '../recognition/baidu-ocr-adapter.js';
import type { VisionProviderChoice } from '../ai/provider.js';

export type OcrEngineName = 'tesseract' | 'baidu';

export const OCR_ENGINES: readonly OcrEngineName[] = ['tesseract', 'baidu'];
export const VISION_PROVIDER_CHOICES: readonly VisionProviderChoice[] = ['openai', 'anthropic', 'auto'];

export interface DocFusionConfig {
  ocr: {
    engine: OcrEngineName;
    /** Tesseract language string. Default: eng+chi_sim */
    language: string;
    /** Use DOCFUSION_BAIDU_API_KEY / DOCFUSION_BAIDU_SECRET_KEY rather than storing keys here. */
    baiduApiKey?: string;
    baiduSecretKey?: string;
    /** Default: accurate_basic */
    baiduMethod: BaiduOcrMethod;
    /** Where Tesseract language data is staged. Default: ~/.docfusion/tessdata */
    dataDir?: string;
  };
  vision: {
    provider: VisionProviderChoice;
    openaiApiKey?: string;
    anthropicApiKey?: string;
    /** Overrides the provider's default model */
    model?: string;
    /** Default: 2000 */
    maxTokens: number;
    /** Confidence reported for vision output. Default: 1.0 */
    defaultConfidence: number;
  };
  pipeline: {
    useOcr: boolean;
    useVision: boolean;
    /** Default: 10 */
    minTextLength: number;
    /** Default: 30000 */
    ocrTimeoutMs: number;
    /** Default: 60000 */
    visionTimeoutMs: number;
    /** Units processed at once. Default: 4 */
    unitConcurrency: number;
    /** Recognition calls in flight at once, at least 2 so both channels start together. Default: 4 */
    recognitionConcurrency: number;
  };
  fusion: FusionPolicy;
}

export type PartialDocFusionConfig = {
  [K in keyof DocFusionConfig]?: Partial<DocFusionConfig[K]>;
};

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(raw: string): boolean | undefined {
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  return undefined;
}

function parseInteger(raw: string): number | undefined {
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.docfusion', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): DocFusionConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { configPath: this.configPath }
      );
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Failed to read config at ${this.configPath}: expected a JSON object`, {
        configPath: this.configPath,
      });
    }
    return mergeConfig(ConfigManager.defaults(), toPartialConfig(parsed));
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: DocFusionConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /** Delete the config file. Subsequent loads return defaults. */
  reset(): void {
    if (fs.existsSync(this.configPath)) {
      fs.unlinkSync(this.configPath);
    }
  }

  /**
   * Validate a config object. Returns an errors array, empty when valid.
   */
  validate(config: PartialDocFusionConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const engine = config.ocr?.engine;
    if (engine !== undefined && !OCR_ENGINES.includes(engine)) {
      errors.push(`ocr.engine must be tesseract | baidu, got: ${engine}`);
    }
    const method = config.ocr?.baiduMethod;
    if (method !== undefined && !BAIDU_OCR_METHODS.includes(method)) {
      errors.push(`ocr.baiduMethod must be one of ${BAIDU_OCR_METHODS.join(' | ')}, got: ${method}`);
    }

    const useOcr = config.pipeline?.useOcr ?? true;
    if (useOcr && engine === 'baidu') {
      if (!config.ocr?.baiduApiKey) {
        errors.push('ocr.baiduApiKey is required for the baidu engine (or set DOCFUSION_BAIDU_API_KEY)');
      }
      if (!config.ocr?.baiduSecretKey) {
        errors.push('ocr.baiduSecretKey is required for the baidu engine (or set DOCFUSION_BAIDU_SECRET_KEY)');
      }
    }

    const provider = config.vision?.provider;
    if (provider !== undefined && !VISION_PROVIDER_CHOICES.includes(provider)) {
      errors.push(`vision.provider must be openai | anthropic | auto, got: ${provider}`);
    }
    // 'auto' is not checked here: keys may come from env vars
    if (config.pipeline?.useVision !== false) {
      if (provider === 'openai' && !config.vision?.openaiApiKey) {
        errors.push('vision.openaiApiKey is required for the openai provider (or set DOCFUSION_OPENAI_KEY)');
      }
      if (provider === 'anthropic' && !config.vision?.anthropicApiKey) {
        errors.push('vision.anthropicApiKey is required for the anthropic provider (or set DOCFUSION_ANTHROPIC_KEY)');
      }
    }

    const confidence = config.vision?.defaultConfidence;
    if (confidence !== undefined && !(confidence >= 0 && confidence <= 1)) {
      errors.push('vision.defaultConfidence must be between 0 and 1');
    }
    if (config.vision?.maxTokens !== undefined && !isPositiveInteger(config.vision.maxTokens)) {
      errors.push('vision.maxTokens must be a positive integer');
    }

    const pipeline = config.pipeline;
    if (pipeline) {
      for (const key of ['ocrTimeoutMs', 'visionTimeoutMs', 'unitConcurrency', 'recognitionConcurrency'] as const) {
        if (pipeline[key] !== undefined && !isPositiveInteger(pipeline[key])) {
          errors.push(`pipeline.${key} must be a positive integer`);
        }
      }
      if (pipeline.recognitionConcurrency === 1) {
        errors.push('pipeline.recognitionConcurrency must be at least 2 (one OCR and one vision call per image)');
      }
      const minTextLength = pipeline.minTextLength;
      if (minTextLength !== undefined && !(Number.isInteger(minTextLength) && minTextLength >= 0)) {
        errors.push('pipeline.minTextLength must be a non-negative integer');
      }
    }

    const fusion = config.fusion;
    if (fusion) {
      if (fusion.tieBand !== undefined && !(fusion.tieBand >= 0)) {
        errors.push('fusion.tieBand must be >= 0');
      }
      if (fusion.dominanceRatio !== undefined && !(fusion.dominanceRatio >= 1)) {
        errors.push('fusion.dominanceRatio must be >= 1');
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   DOCFUSION_OCR_ENGINE, DOCFUSION_OCR_LANGUAGE, DOCFUSION_TESSDATA_DIR,
   *   DOCFUSION_BAIDU_API_KEY, DOCFUSION_BAIDU_SECRET_KEY,
   *   DOCFUSION_VISION_PROVIDER, DOCFUSION_OPENAI_KEY, DOCFUSION_ANTHROPIC_KEY, DOCFUSION_VISION_MODEL,
   *   DOCFUSION_USE_OCR, DOCFUSION_USE_VISION,
   *   DOCFUSION_OCR_TIMEOUT_MS, DOCFUSION_VISION_TIMEOUT_MS,
   *   DOCFUSION_UNIT_CONCURRENCY, DOCFUSION_RECOGNITION_CONCURRENCY
   *
   * Values that do not parse are ignored.
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): DocFusionConfig {
    const config = this.load();

    // OCR
    const engine = OCR_ENGINES.find((e) => e === env.DOCFUSION_OCR_ENGINE);
    if (engine) config.ocr.engine = engine;
    if (env.DOCFUSION_OCR_LANGUAGE) config.ocr.language = env.DOCFUSION_OCR_LANGUAGE;
    if (env.DOCFUSION_TESSDATA_DIR) config.ocr.dataDir = env.DOCFUSION_TESSDATA_DIR;
    if (env.DOCFUSION_BAIDU_API_KEY) config.ocr.baiduApiKey = env.DOCFUSION_BAIDU_API_KEY;
    if (env.DOCFUSION_BAIDU_SECRET_KEY) config.ocr.baiduSecretKey = env.DOCFUSION_BAIDU_SECRET_KEY;

    // Vision
    const provider = VISION_PROVIDER_CHOICES.find((p) => p === env.DOCFUSION_VISION_PROVIDER);
    if (provider) config.vision.provider = provider;
    if (env.DOCFUSION_OPENAI_KEY) config.vision.openaiApiKey = env.DOCFUSION_OPENAI_KEY;
    if (env.DOCFUSION_ANTHROPIC_KEY) config.vision.anthropicApiKey = env.DOCFUSION_ANTHROPIC_KEY;
    if (env.DOCFUSION_VISION_MODEL) config.vision.model = env.DOCFUSION_VISION_MODEL;

    // Pipeline
    if (env.DOCFUSION_USE_OCR) {
      config.pipeline.useOcr = parseBoolean(env.DOCFUSION_USE_OCR) ?? config.pipeline.useOcr;
    }
    if (env.DOCFUSION_USE_VISION) {
      config.pipeline.useVision = parseBoolean(env.DOCFUSION_USE_VISION) ?? config.pipeline.useVision;
    }
    if (env.DOCFUSION_OCR_TIMEOUT_MS) {
      config.pipeline.ocrTimeoutMs = parseInteger(env.DOCFUSION_OCR_TIMEOUT_MS) ?? config.pipeline.ocrTimeoutMs;
    }
    if (env.DOCFUSION_VISION_TIMEOUT_MS) {
      config.pipeline.visionTimeoutMs =
        parseInteger(env.DOCFUSION_VISION_TIMEOUT_MS) ?? config.pipeline.visionTimeoutMs;
    }
    if (env.DOCFUSION_UNIT_CONCURRENCY) {
      config.pipeline.unitConcurrency =
        parseInteger(env.DOCFUSION_UNIT_CONCURRENCY) ?? config.pipeline.unitConcurrency;
    }
    if (env.DOCFUSION_RECOGNITION_CONCURRENCY) {
      config.pipeline.recognitionConcurrency =
        parseInteger(env.DOCFUSION_RECOGNITION_CONCURRENCY) ?? config.pipeline.recognitionConcurrency;
    }

    return config;
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): DocFusionConfig {
    return {
      ocr: {
        engine: 'tesseract',
        language: 'eng+chi_sim',
        baiduMethod: 'accurate_basic',
      },
      vision: {
        provider: 'auto',
        maxTokens: 2000,
        defaultConfidence: 1.0,
      },
      pipeline: {
        useOcr: true,
        useVision: true,
        minTextLength: 10,
        ocrTimeoutMs: 30_000,
        visionTimeoutMs: 60_000,
        unitConcurrency: 4,
        recognitionConcurrency: 4,
      },
      fusion: resolveFusionPolicy(),
    };
  }
}

/**
 * Sections of a parsed config file. Field values are checked by
 * ConfigManager.validate(), not here.
 */
function toPartialConfig(raw: Record<string, unknown>): PartialDocFusionConfig {
  const partial: Record<string, unknown> = {};
  for (const section of ['ocr', 'vision', 'pipeline', 'fusion'] as const) {
    if (isRecord(raw[section])) partial[section] = raw[section];
  }
  return partial as PartialDocFusionConfig;
}

/** Deep-merge source into target (non-destructive). */
export function mergeConfig(target: DocFusionConfig, source: PartialDocFusionConfig): DocFusionConfig {
  const result = { ...target };
  if (source.ocr) result.ocr = { ...target.ocr, ...source.ocr };
  if (source.vision) result.vision = { ...target.vision, ...source.vision };
  if (source.pipeline) result.pipeline = { ...target.pipeline, ...source.pipeline };
  if (source.fusion) {
    result.fusion = {
      ...target.fusion,
      ...source.fusion,
      quality: { ...target.fusion.quality, ...source.fusion.quality },
    };
  }
  return result;
}

/**
 * Set one dotted key (e.g. `pipeline.unitConcurrency`) from a CLI string.
 * The value is coerced to the type of the current value.
 */
export function setConfigValue(config: DocFusionConfig, key: string, raw: string): DocFusionConfig {
  const parts = key.split('.');
  if (parts.length < 2) {
    throw new ConfigurationError(`Config key must look like section.field, got: ${key}`, { key });
  }

  const updated: unknown = JSON.parse(JSON.stringify(config));
  let node: unknown = updated;
  for (const part of parts.slice(0, -1)) {
    if (!isRecord(node) || !isRecord(node[part])) {
      throw new ConfigurationError(`Unknown config section: ${key}`, { key });
    }
    node = node[part];
  }

  const field = parts[parts.length - 1];
  if (!isRecord(node) || field === undefined) {
    throw new ConfigurationError(`Unknown config key: ${key}`, { key });
  }

  const current = node[field];
  if (typeof current === 'number') {
    const value = Number(raw);
    if (Number.isNaN(value)) throw new ConfigurationError(`${key} expects a number, got: ${raw}`, { key });
    node[field] = value;
  } else if (typeof current === 'boolean') {
    const value = parseBoolean(raw);
    if (value === undefined) throw new ConfigurationError(`${key} expects true or false, got: ${raw}`, { key });
    node[field] = value;
  } else if (current === undefined || typeof current === 'string') {
    node[field] = raw;
  } else {
    throw new ConfigurationError(`${key} cannot be set from the command line`, { key });
  }

  if (!isRecord(updated)) {
    throw new ConfigurationError(`Unknown config key: ${key}`, { key });
  }
  return mergeConfig(ConfigManager.defaults(), toPartialConfig(updated));
}
