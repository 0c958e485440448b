/**
 * Vision Provider Tests
 *
 * All tests use mocked API clients; no real network calls.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

// ──────────────────────────────────────────────────────────────────────────────
// Module mocks (must be declared before imports that use them)
// ──────────────────────────────────────────────────────────────────────────────

const { openaiCreate, anthropicCreate, openaiCtor, anthropicCtor } = vi.hoisted(() => ({
  openaiCreate: vi.fn(),
  anthropicCreate: vi.fn(),
  openaiCtor: vi.fn(),
  anthropicCtor: vi.fn(),
}));

vi.mock('openai', () => ({
  default: vi.fn(function (options: unknown) {
    openaiCtor(options);
    return { chat: { completions: { create: openaiCreate } } };
  }),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn(function (options: unknown) {
    anthropicCtor(options);
    return { messages: { create: anthropicCreate } };
  }),
}));

// ──────────────────────────────────────────────────────────────────────────────
// Imports (after mocks are defined)
// ──────────────────────────────────────────────────────────────────────────────

import { OpenAIProvider } from './openai-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { VisionProviderRegistry } from './provider-registry.js';
import { TRANSCRIPTION_PROMPT, TRANSCRIPTION_SYSTEM_PROMPT } from './system-prompts.js';
import type { VisionRequest } from './provider.js';
import { ConfigurationError } from '../errors/docfusion-error.js';

// ──────────────────────────────────────────────────────────────────────────────
// Test helpers
// ──────────────────────────────────────────────────────────────────────────────

function makeRequest(overrides: Partial<VisionRequest> = {}): VisionRequest {
  return {
    imageData: Buffer.from('fake-png-data'),
    mimeType: 'image/png',
    ...overrides,
  };
}

beforeEach(() => {
  openaiCreate.mockReset();
  anthropicCreate.mockReset();
  openaiCtor.mockReset();
  anthropicCtor.mockReset();
});

// ──────────────────────────────────────────────────────────────────────────────
// OpenAIProvider
// ──────────────────────────────────────────────────────────────────────────────

describe('OpenAIProvider', () => {
  it('isAvailable() depends on a non-blank apiKey', () => {
    expect(new OpenAIProvider({ apiKey: 'test-secret' }).isAvailable()).toBe(true);
    expect(new OpenAIProvider({ apiKey: '  ' }).isAvailable()).toBe(false);
  });

  it('passes timeout and retries to the SDK client', () => {
    new OpenAIProvider({ apiKey: 'test-secret', timeoutMs: 5000, maxRetries: 0 });
    expect(openaiCtor).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 5000, maxRetries: 0 });
  });

  it('sends the image as a base64 data URL with the transcription prompts', async () => {
    openaiCreate.mockResolvedValue({
      choices: [{ message: { content: 'Transcribed text' } }],
      usage: { prompt_tokens: 500, completion_tokens: 100 },
    });

    const result = await new OpenAIProvider({ apiKey: 'test-secret' }).transcribe(makeRequest());

    expect(openaiCreate).toHaveBeenCalledOnce();
    const args = openaiCreate.mock.calls[0]?.[0];
    expect(args.model).toBe('gpt-4o');
    expect(args.temperature).toBe(0);
    expect(args.max_tokens).toBe(2000);
    expect(args.messages[0]).toEqual({ role: 'system', content: TRANSCRIPTION_SYSTEM_PROMPT });
    expect(args.messages[1].content[0].image_url.url).toBe(
      `data:image/png;base64,${Buffer.from('fake-png-data').toString('base64')}`
    );
    expect(args.messages[1].content[1]).toEqual({ type: 'text', text: TRANSCRIPTION_PROMPT });

    expect(result).toMatchObject({
      provider: 'openai',
      model: 'gpt-4o',
      content: 'Transcribed text',
      inputTokens: 500,
      outputTokens: 100,
    });
  });

  it('uses the configured model, request prompt and max tokens', async () => {
    openaiCreate.mockResolvedValue({ choices: [{ message: { content: 'x' } }] });
    await new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini', maxTokens: 800 }).transcribe(
      makeRequest({ prompt: 'Only the table', maxTokens: 300 })
    );
    const args = openaiCreate.mock.calls[0]?.[0];
    expect(args.model).toBe('gpt-4o-mini');
    expect(args.max_tokens).toBe(300);
    expect(args.messages[1].content[1].text).toBe('Only the table');
  });

  it('returns empty content when the model sends none', async () => {
    openaiCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const result = await new OpenAIProvider({ apiKey: 'test-secret' }).transcribe(makeRequest());
    expect(result.content).toBe('');
    expect(result.inputTokens).toBe(0);
  });

  it('propagates SDK errors', async () => {
    openaiCreate.mockRejectedValue(new Error('rate limit'));
    await expect(new OpenAIProvider({ apiKey: 'test-secret' }).transcribe(makeRequest())).rejects.toThrow('rate limit');
  });
});

// ──────────────────────────────────────────────────────────────────────────────
// AnthropicProvider
// ──────────────────────────────────────────────────────────────────────────────

describe('AnthropicProvider', () => {
  it('has correct name and defaultModel', () => {
    const provider = new AnthropicProvider({ apiKey: 'test-secret' });
    expect(provider.name).toBe('anthropic');
    expect(provider.defaultModel).toBe('claude-sonnet-4-5');
  });

  it('sends a base64 image block and joins text blocks', async () => {
    anthropicCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'Line A' },
        { type: 'tool_use', id: 't1', name: 'noop', input: {} },
        { type: 'text', text: 'Line B' },
      ],
      usage: { input_tokens: 700, output_tokens: 40 },
    });

    const result = await new AnthropicProvider({ apiKey: 'test-secret' }).transcribe(
      makeRequest({ mimeType: 'image/jpeg' })
    );

    const args = anthropicCreate.mock.calls[0]?.[0];
    expect(args.system).toBe(TRANSCRIPTION_SYSTEM_PROMPT);
    expect(args.max_tokens).toBe(2000);
    expect(args.messages[0].content[0]).toEqual({
      type: 'image',
      source: { type: 'base64', media_type: 'image/jpeg', data: Buffer.from('fake-png-data').toString('base64') },
    });
    expect(result).toMatchObject({
      provider: 'anthropic',
      content: 'Line A\nLine B',
      inputTokens: 700,
      outputTokens: 40,
    });
  });
});

// ──────────────────────────────────────────────────────────────────────────────
// VisionProviderRegistry
// ──────────────────────────────────────────────────────────────────────────────

describe('VisionProviderRegistry', () => {
  it('auto selects the first available provider in registration order', () => {
    const registry = new VisionProviderRegistry();
    registry.register(new OpenAIProvider({ apiKey: '' }));
    registry.register(new AnthropicProvider({ apiKey: 'test-secret' }));
    expect(registry.select('auto')?.name).toBe('anthropic');
    expect(registry.select('openai')).toBeUndefined();
    expect(registry.getAvailableProviders()).toEqual(['anthropic']);
  });

  it('routes transcribe to the selected provider', async () => {
    anthropicCreate.mockResolvedValue({ content: [{ type: 'text', text: 'from claude' }], usage: { input_tokens: 1, output_tokens: 1 } });
    const registry = new VisionProviderRegistry();
    registry.register(new OpenAIProvider({ apiKey: 'test-secret' }));
    registry.register(new AnthropicProvider({ apiKey: 'test-secret' }));
    const result = await registry.transcribe(makeRequest(), 'anthropic');
    expect(result.content).toBe('from claude');
    expect(openaiCreate).not.toHaveBeenCalled();
  });

  it('throws ConfigurationError when nothing is usable', async () => {
    const registry = new VisionProviderRegistry();
    await expect(registry.transcribe(makeRequest())).rejects.toBeInstanceOf(ConfigurationError);
    await expect(registry.transcribe(makeRequest(), 'openai')).rejects.toThrow(
      "Vision provider 'openai' is not registered. Call register() first."
    );
  });
});
