/**
 * OpenAI Provider
 *
 * Sends an image to a vision-capable GPT model for transcription.
 */

import OpenAI from 'openai';
import type { VisionProvider, VisionProviderConfig, VisionProviderName, VisionRequest, VisionResult } from './provider.js';
import { TRANSCRIPTION_PROMPT, TRANSCRIPTION_SYSTEM_PROMPT } from './system-prompts.js';

export class OpenAIProvider implements VisionProvider {
  readonly name: VisionProviderName = 'openai';
  readonly defaultModel = 'gpt-4o';

  private client: OpenAI;
  private config: VisionProviderConfig;

  constructor(config: VisionProviderConfig) {
    this.config = config;
    this.client = new OpenAI({
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

    const dataUrl = `data:${request.mimeType};base64,${request.imageData.toString('base64')}`;

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      {
        role: 'system',
        content: TRANSCRIPTION_SYSTEM_PROMPT,
      },
      {
        role: 'user',
        content: [
          {
            type: 'image_url',
            image_url: { url: dataUrl, detail: 'high' },
          },
          {
            type: 'text',
            text: request.prompt ?? TRANSCRIPTION_PROMPT,
          },
        ],
      },
    ];

    const response = await this.client.chat.completions.create({
      model,
      messages,
      max_tokens: request.maxTokens ?? this.config.maxTokens ?? 2000,
      temperature: 0,
    });

    const content = response.choices[0]?.message.content ?? '';

    return {
      provider: this.name,
      model,
      content,
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      durationMs: Date.now() - start,
    };
  }
}
