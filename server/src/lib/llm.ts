import { AnthropicProvider, OpenAICompatibleProvider, type LLMProvider } from './llm-provider.js';
import { SetupError } from './errors.js';
import type { LlmConfig } from './config.js';

// ─── Provider factory ────────────────────────────────────────────────

/**
 * Build the configured provider. A missing API key is a SetupError so the
 * job that asked for it fails before any record is dispatched.
 */
export function createProvider(config: LlmConfig): LLMProvider {
  if (!config.apiKey) {
    const variable = config.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'LLM_API_KEY';
    throw new SetupError('LLM provider is not configured', [
      `${variable} is required when LLM_PROVIDER=${config.provider}`,
    ]);
  }

  if (config.provider === 'openai-compatible') {
    return new OpenAICompatibleProvider({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      logprobs: config.logprobs,
    });
  }

  return new AnthropicProvider(config.apiKey);
}
