/**
 * Title resolver: one bounded, retried LLM call per triggered record.
 *
 * Every call ends in a ResolutionResult. Ambiguity, unparseable replies,
 * exhausted retries and cancellation all become review-required values; the
 * resolver never throws into the orchestrator.
 */

import type { ResolverConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { chatWithTimeout, type LLMProvider, type TokenUsage } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { executeWithRetry, type RetryPolicy } from '../lib/retry.js';
import { buildResolutionPrompt, TITLE_RESOLUTION_SYSTEM_PROMPT, type PersonContext } from './prompts.js';
import { decodeTitleResponse } from './response-decoder.js';
import type { ResolutionMode, ResolutionResult } from './types.js';

export interface TitleResolverOptions {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  /** Used when the provider exposes no confidence signal. */
  defaultConfidence: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface ResolveCallOptions {
  /** Checked between attempts; false stops retrying with outcome `cancelled`. */
  shouldContinue?: () => boolean;
  /** Wakes a pending backoff wait when the job is cancelled. */
  signal?: AbortSignal;
  log?: Logger;
}

export class TitleResolver {
  private readonly options: TitleResolverOptions;

  constructor(options: TitleResolverOptions) {
    this.options = options;
  }

  static fromConfig(provider: LLMProvider, model: string, config: ResolverConfig): TitleResolver {
    return new TitleResolver({
      provider,
      model,
      maxTokens: config.maxTokens,
      timeoutMs: config.timeoutMs,
      retryPolicy: {
        maxAttempts: config.maxAttempts,
        baseDelay: config.baseDelayMs,
        maxDelay: config.maxDelayMs,
      },
      defaultConfidence: config.defaultConfidence,
    });
  }

  async resolve(
    context: PersonContext,
    mode: ResolutionMode,
    callOptions: ResolveCallOptions = {},
  ): Promise<ResolutionResult> {
    const { provider, model, maxTokens, timeoutMs, retryPolicy } = this.options;
    const log = callOptions.log;
    const usage: TokenUsage = { input_tokens: 0, output_tokens: 0 };
    const prompt = buildResolutionPrompt(context, mode);

    const outcome = await executeWithRetry(
      async () => {
        const response = await chatWithTimeout(
          provider,
          {
            model,
            system: TITLE_RESOLUTION_SYSTEM_PROMPT,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: maxTokens,
          },
          timeoutMs,
        );
        usage.input_tokens += response.usage.input_tokens;
        usage.output_tokens += response.usage.output_tokens;
        return response;
      },
      {
        policy: retryPolicy,
        shouldContinue: callOptions.shouldContinue,
        signal: callOptions.signal,
        sleep: this.options.sleep,
        random: this.options.random,
        onRetry: (attempt, delayMs, error) => {
          log?.warn(
            { personId: context.person_id, attempt, delayMs, error: error.message },
            'Resolver call failed, retrying',
          );
        },
      },
    );

    if (!outcome.ok) {
      log?.warn(
        { personId: context.person_id, attempts: outcome.attempts, reason: outcome.reason, error: outcome.error.message },
        'Resolver gave up',
      );
      return {
        mode,
        resolved_title: null,
        confidence: 0,
        review_required: true,
        raw_model_output: '',
        outcome: outcome.reason === 'cancelled' ? 'cancelled' : 'provider_failure',
        attempts: outcome.attempts,
        error: errorMessage(outcome.error),
        usage,
      };
    }

    const raw = outcome.value.text;
    const decoded = decodeTitleResponse(raw);
    const base = { mode, raw_model_output: raw, attempts: outcome.attempts, usage };

    switch (decoded.kind) {
      case 'clean_title':
        return {
          ...base,
          resolved_title: decoded.title,
          confidence: outcome.value.confidence ?? this.options.defaultConfidence,
          review_required: false,
          outcome: 'clean_title',
          error: null,
        };
      case 'review_required':
        return {
          ...base,
          resolved_title: null,
          confidence: 0,
          review_required: true,
          outcome: 'review_required',
          error: null,
        };
      case 'parse_error':
        log?.debug({ personId: context.person_id, reason: decoded.reason }, 'Unparseable resolver reply');
        return {
          ...base,
          resolved_title: null,
          confidence: 0,
          review_required: true,
          outcome: 'parse_error',
          error: decoded.reason,
        };
    }
  }
}
