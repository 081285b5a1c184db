import type Anthropic from '@anthropic-ai/sdk';
import { createAnthropicClient, extractResponseText } from './anthropic.js';
import {
  ProviderRequestError,
  ProviderTimeoutError,
  TransientProviderError,
} from './errors.js';
import { isRetryableStatus } from './retry.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResponse {
  text: string;
  usage: TokenUsage;
  /** 0..1, only when the provider exposes token probabilities. */
  confidence?: number;
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/**
 * Issue one chat call bounded by `timeoutMs`. On expiry the provider's signal
 * is aborted and the call rejects with ProviderTimeoutError, whatever the
 * provider does with the abort.
 */
export async function chatWithTimeout(
  provider: LLMProvider,
  params: Omit<ChatParams, 'signal'>,
  timeoutMs: number,
): Promise<ChatResponse> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new ProviderTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      provider.chat({ ...params, signal: controller.signal }),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = createAnthropicClient(apiKey);
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    // SDK errors carry status and headers; classifyFailure reads both.
    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages,
        temperature: 0,
      },
      { signal: params.signal },
    );

    return {
      text: extractResponseText(response),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
  /** Ask for token logprobs so replies carry a confidence. */
  logprobs?: boolean;
  fetchImpl?: typeof fetch;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai-compatible';
  private apiKey: string;
  private baseUrl: string;
  private logprobs: boolean;
  private fetchImpl: typeof fetch;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.logprobs = config.logprobs ?? false;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(this.buildRequestBody(params)),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      const message = `LLM API error ${response.status}: ${errText.slice(0, 300)}`;
      if (isRetryableStatus(response.status)) {
        throw new TransientProviderError(message, response.status, response.headers);
      }
      throw new ProviderRequestError(message, response.status);
    }

    const data = await response.json() as OpenAIChatResponse;
    return this.parseResponse(data);
  }

  // ─── Translation helpers ─────────────────────────────────────────

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      temperature: 0,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages.map((m) => ({ role: m.role, content: m.content })),
      ],
    };
    if (this.logprobs) {
      body.logprobs = true;
    }
    return body;
  }

  private parseResponse(data: OpenAIChatResponse): ChatResponse {
    const choice = data.choices?.[0];
    return {
      text: choice?.message?.content ?? '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
      confidence: confidenceFromLogprobs(choice?.logprobs?.content),
    };
  }
}

/**
 * Geometric-mean token probability, i.e. exp(mean logprob), clamped to 0..1.
 * Undefined when the provider returned no token logprobs.
 */
export function confidenceFromLogprobs(
  tokens: Array<{ logprob: number }> | null | undefined,
): number | undefined {
  if (!tokens || tokens.length === 0) return undefined;
  const finite = tokens.map((t) => t.logprob).filter((lp) => Number.isFinite(lp));
  if (finite.length === 0) return undefined;
  const mean = finite.reduce((sum, lp) => sum + lp, 0) / finite.length;
  return Math.min(1, Math.max(0, Math.exp(mean)));
}

// ─── OpenAI-compatible type definitions (internal) ───────────────────

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
    logprobs?: {
      content?: Array<{ token: string; logprob: number }> | null;
    } | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}
