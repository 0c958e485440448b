/**
 * Vision Provider Module
 *
 * Barrel export for the vision-language provider abstraction layer.
 */

export { OpenAIProvider } from './openai-provider.js';
export { AnthropicProvider } from './anthropic-provider.js';
export { VisionProviderRegistry } from './provider-registry.js';
export { TRANSCRIPTION_PROMPT, TRANSCRIPTION_SYSTEM_PROMPT } from './system-prompts.js';
export type {
  VisionProvider,
  VisionProviderConfig,
  VisionProviderName,
  VisionProviderChoice,
  VisionRequest,
  VisionResult,
} from './provider.js';
