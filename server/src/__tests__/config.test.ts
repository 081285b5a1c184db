import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config.js';
import { SetupError } from '../lib/errors.js';
import { createProvider } from '../lib/llm.js';
import { AnthropicProvider, OpenAICompatibleProvider } from '../lib/llm-provider.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3001);
    expect(config.jobConcurrency).toBe(5);
    expect(config.maxJobRecords).toBe(10_000);
    expect(config.llm).toMatchObject({ provider: 'anthropic', apiKey: undefined });
    expect(config.resolver).toEqual({
      maxTokens: 64,
      timeoutMs: 30_000,
      maxAttempts: 3,
      baseDelayMs: 1_000,
      maxDelayMs: 10_000,
      defaultConfidence: 0.5,
    });
  });

  it('picks the OpenAI-compatible provider when only its key is set', () => {
    const config = loadConfig({
      LLM_API_KEY: 'test-secret',
      LLM_BASE_URL: 'https://llm.example.test/v1/',
      LLM_LOGPROBS: 'true',
    });
    expect(config.llm).toEqual({
      provider: 'openai-compatible',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      baseUrl: 'https://llm.example.test/v1',
      logprobs: true,
    });
  });

  it('honors an explicit provider regardless of case', () => {
    const config = loadConfig({ LLM_PROVIDER: 'Anthropic', LLM_API_KEY: 'test-secret', ANTHROPIC_API_KEY: '  ' });
    expect(config.llm.provider).toBe('anthropic');
    expect(config.llm.apiKey).toBeUndefined();
  });

  it('reports every invalid variable in one SetupError', () => {
    let caught: unknown;
    try {
      loadConfig({ JOB_CONCURRENCY: '0', LLM_PROVIDER: 'gemini' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SetupError);
    if (!(caught instanceof SetupError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues.some((i) => i.startsWith('LLM_PROVIDER: '))).toBe(true);
    expect(caught.issues.some((i) => i.startsWith('JOB_CONCURRENCY: '))).toBe(true);
  });
});

describe('createProvider', () => {
  it('raises SetupError when the key is missing', () => {
    expect(() => createProvider(loadConfig({}).llm)).toThrow(
      'LLM provider is not configured: ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic',
    );
    expect(() => createProvider(loadConfig({ LLM_PROVIDER: 'openai-compatible' }).llm)).toThrow(
      'LLM_API_KEY is required when LLM_PROVIDER=openai-compatible',
    );
  });

  it('builds the configured provider', () => {
    expect(createProvider(loadConfig({ ANTHROPIC_API_KEY: 'test-secret' }).llm)).toBeInstanceOf(AnthropicProvider);
    expect(createProvider(loadConfig({ LLM_API_KEY: 'test-secret' }).llm)).toBeInstanceOf(OpenAICompatibleProvider);
  });
});
