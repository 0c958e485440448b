/**
 * Vision Provider Abstraction
 *
 * Unified interface over vision-language model services (OpenAI, Anthropic).
 * The vision recognition adapter talks to providers through the registry and
 * never to an SDK directly.
 */

import type { ImageMimeType } from '../recognition/image-format.js';

export type VisionProviderName = 'openai' | 'anthropic';

/** 'auto' picks the first available provider in registration order. */
export type VisionProviderChoice = VisionProviderName | 'auto';

export interface VisionProviderConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  /** SDK request timeout. Default: 60000 */
  timeoutMs?: number;
  /** SDK-level retries. Default: 2 */
  maxRetries?: number;
}

export interface VisionRequest {
  imageData: Buffer;
  mimeType: ImageMimeType;
  /** User-turn instruction sent alongside the image */
  prompt?: string;
  maxTokens?: number;
}

export interface VisionResult {
  provider: VisionProviderName;
  model: string;
  content: string;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
}

export interface VisionProvider {
  readonly name: VisionProviderName;
  readonly defaultModel: string;
  isAvailable(): boolean;
  transcribe(request: VisionRequest): Promise<VisionResult>;
}
