/**
 * Anthropic Provider
 *
 * Sends an image to a Claude model for transcription.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { VisionProvider, VisionProviderConfig, VisionProviderName, VisionRequest, VisionResult } from './provider.js';
import { TRANSCRIPTION_PROMPT, TRANSCRIPTION_SYSTEM_PROMPT } from './system-prompts.js';

export class AnthropicProvider implements VisionProvider {
  readonly name: VisionProviderName = 'anthropic';
  readonly defaultModel = 'claude-sonnet-4-5';

  private client: Anthropic;
  private config: VisionProviderConfig;

  constructor(config: VisionProviderConfig) {
    this.config = config;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? 60_000,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  isAvailable(): boolean {
    return Boolean(this.config.apiKey && this.config.apiKey.trim().length > 0);
  }

  async transcribe(request: VisionRequest): Promise<VisionResult> {
    const start = Date.now();
    const model = this.config.model ?? this.defaultModel;

    const response = await this.client.messages.create({
      model,
      system: TRANSCRIPTION_SYSTEM_PROMPT,
      max_tokens: request.maxTokens ?? this.config.maxTokens ?? 2000,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: {
                type: 'base64',
                media_type: request.mimeType,
                data: request.imageData.toString('base64'),
              },
            },
            {
              type: 'text',
              text: request.prompt ?? TRANSCRIPTION_PROMPT,
            },
          ],
        },
      ],
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }

    return {
      provider: this.name,
      model,
      content: parts.join('\n'),
      inputTokens: response.usage?.input_tokens ?? 0,
      outputTokens: response.usage?.output_tokens ?? 0,
      durationMs: Date.now() - start,
    };
  }
}
