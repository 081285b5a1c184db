import { describe, it, expect, vi } from 'vitest';
import { TitleResolver } from '../engine/resolver.js';
import type { PersonContext } from '../engine/prompts.js';
import { ProviderRequestError } from '../lib/errors.js';
import type { ChatParams, ChatResponse, LLMProvider } from '../lib/llm-provider.js';

type Script = Array<ChatResponse | Error | 'hang'>;

function scriptedProvider(script: Script) {
  const calls: ChatParams[] = [];
  const provider: LLMProvider = {
    name: 'scripted',
    chat: vi.fn(async (params: ChatParams) => {
      calls.push(params);
      const step = script[Math.min(calls.length - 1, script.length - 1)];
      if (step === 'hang') {
        return new Promise<ChatResponse>((_, reject) => {
          params.signal?.addEventListener('abort', () => reject(new Error('aborted by caller')));
        });
      }
      if (step instanceof Error) throw step;
      return step;
    }),
  };
  return { provider, calls };
}

function reply(text: string, confidence?: number): ChatResponse {
  return { text, usage: { input_tokens: 40, output_tokens: 4 }, confidence };
}

function makeResolver(provider: LLMProvider, timeoutMs = 1_000) {
  return new TitleResolver({
    provider,
    model: 'test-model',
    maxTokens: 64,
    timeoutMs,
    retryPolicy: { maxAttempts: 3, baseDelay: 1, maxDelay: 1 },
    defaultConfidence: 0.5,
    sleep: async () => {},
  });
}

const person: PersonContext = {
  person_id: 'p-1',
  full_name: 'Dana Reyes',
  title_input: null,
  title_new: 'sr. data eng',
  company_input: 'Acme Inc.',
  company_new: 'Acme',
  augmentation_status: 'matched',
};

describe('TitleResolver', () => {
  it('returns a clean title with the default confidence', async () => {
    const { provider, calls } = scriptedProvider([reply('Senior Data Engineer')]);
    const result = await makeResolver(provider).resolve(person, 'extrapolate');

    expect(result).toEqual({
      mode: 'extrapolate',
      resolved_title: 'Senior Data Engineer',
      confidence: 0.5,
      review_required: false,
      raw_model_output: 'Senior Data Engineer',
      outcome: 'clean_title',
      attempts: 1,
      error: null,
      usage: { input_tokens: 40, output_tokens: 4 },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].model).toBe('test-model');
    expect(calls[0].max_tokens).toBe(64);
    expect(calls[0].messages[0].content).toContain('Title per feed: sr. data eng');
  });

  it('uses provider confidence when present', async () => {
    const { provider } = scriptedProvider([reply('Senior Data Engineer', 0.92)]);
    const result = await makeResolver(provider).resolve(person, 'extrapolate');
    expect(result.confidence).toBe(0.92);
  });

  it('sends both titles when arbitrating', async () => {
    const { provider, calls } = scriptedProvider([reply('VP of Sales')]);
    await makeResolver(provider).resolve(
      { ...person, title_input: 'Sales Director', title_new: 'VP Sales' },
      'arbitrate',
    );
    expect(calls[0].messages[0].content).toContain('Title on file: Sales Director');
    expect(calls[0].messages[0].content).toContain('Title per feed: VP Sales');
  });

  it('maps the review sentinel to review_required without retrying', async () => {
    const { provider, calls } = scriptedProvider([reply('REVIEW_MANUAL')]);
    const result = await makeResolver(provider).resolve(person, 'arbitrate');

    expect(calls).toHaveLength(1);
    expect(result).toMatchObject({
      resolved_title: null,
      review_required: true,
      outcome: 'review_required',
      confidence: 0,
      raw_model_output: 'REVIEW_MANUAL',
    });
  });

  it('maps a malformed reply to review_required without retrying', async () => {
    const { provider, calls } = scriptedProvider([reply('Well, it depends.\nProbably a manager.')]);
    const result = await makeResolver(provider).resolve(person, 'extrapolate');

    expect(calls).toHaveLength(1);
    expect(result).toMatchObject({
      resolved_title: null,
      review_required: true,
      outcome: 'parse_error',
      error: 'reply spans multiple lines',
    });
  });

  it('retries timeouts and gives up with review_required', async () => {
    const { provider, calls } = scriptedProvider(['hang']);
    const result = await makeResolver(provider, 5).resolve(person, 'extrapolate');

    expect(calls).toHaveLength(3);
    expect(calls.every((c) => c.signal?.aborted)).toBe(true);
    expect(result).toEqual({
      mode: 'extrapolate',
      resolved_title: null,
      confidence: 0,
      review_required: true,
      raw_model_output: '',
      outcome: 'provider_failure',
      attempts: 3,
      error: 'Provider call timed out after 5ms',
      usage: { input_tokens: 0, output_tokens: 0 },
    });
  });

  it('recovers after a transient failure and sums usage over attempts', async () => {
    const { provider } = scriptedProvider([
      new ProviderRequestError('LLM API error 503: busy', 503),
      reply('Staff Engineer'),
    ]);
    const result = await makeResolver(provider).resolve(person, 'extrapolate');

    expect(result.outcome).toBe('clean_title');
    expect(result.attempts).toBe(2);
    expect(result.usage).toEqual({ input_tokens: 40, output_tokens: 4 });
  });

  it('gives up at once on a non-transient provider error', async () => {
    const { provider, calls } = scriptedProvider([new ProviderRequestError('LLM API error 401: bad key', 401)]);
    const result = await makeResolver(provider).resolve(person, 'extrapolate');

    expect(calls).toHaveLength(1);
    expect(result).toMatchObject({
      outcome: 'provider_failure',
      attempts: 1,
      error: 'LLM API error 401: bad key',
      review_required: true,
    });
  });

  it('reports cancellation when told to stop between attempts', async () => {
    const { provider, calls } = scriptedProvider([new ProviderRequestError('LLM API error 503: busy', 503)]);
    const result = await makeResolver(provider).resolve(person, 'extrapolate', {
      shouldContinue: () => false,
    });

    expect(calls).toHaveLength(1);
    expect(result).toMatchObject({ outcome: 'cancelled', resolved_title: null, review_required: true });
  });
});
