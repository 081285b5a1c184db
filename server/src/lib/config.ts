import { z } from 'zod';
import { SetupError } from './errors.js';
import { formatIssues } from './validate.js';

function positiveInt(fallback: number) {
  return z.coerce.number().int().positive().default(fallback);
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envBool = z
  .string()
  .optional()
  .transform((value) => value === '1' || value?.toLowerCase() === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  LLM_PROVIDER: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase())
    .pipe(z.enum(['anthropic', 'openai-compatible']).optional()),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  LLM_API_KEY: optionalString,
  LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_LOGPROBS: envBool,
  RESOLVER_MAX_TOKENS: positiveInt(64),
  RESOLVER_TIMEOUT_MS: positiveInt(30_000),
  RESOLVER_MAX_ATTEMPTS: positiveInt(3),
  RESOLVER_BASE_DELAY_MS: positiveInt(1_000),
  RESOLVER_MAX_DELAY_MS: positiveInt(10_000),
  RESOLVER_DEFAULT_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),
  JOB_CONCURRENCY: positiveInt(5),
  MAX_JOB_RECORDS: positiveInt(10_000),
  MAX_JOB_BODY_BYTES: positiveInt(5_000_000),
});

export type LlmProviderName = 'anthropic' | 'openai-compatible';

export interface LlmConfig {
  provider: LlmProviderName;
  apiKey: string | undefined;
  model: string;
  baseUrl: string;
  logprobs: boolean;
}

export interface ResolverConfig {
  maxTokens: number;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  defaultConfidence: number;
}

export interface EngineConfig {
  nodeEnv: string;
  port: number;
  llm: LlmConfig;
  resolver: ResolverConfig;
  jobConcurrency: number;
  maxJobRecords: number;
  maxJobBodyBytes: number;
}

/**
 * Parse engine configuration from environment variables.
 * Throws SetupError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new SetupError('Invalid configuration', formatIssues(parsed.error.issues));
  }
  const e = parsed.data;

  // Explicit LLM_PROVIDER wins; otherwise pick whichever key is present.
  const provider: LlmProviderName = e.LLM_PROVIDER
    ?? (e.LLM_API_KEY && !e.ANTHROPIC_API_KEY ? 'openai-compatible' : 'anthropic');

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    llm: provider === 'anthropic'
      ? {
          provider,
          apiKey: e.ANTHROPIC_API_KEY,
          model: e.ANTHROPIC_MODEL,
          baseUrl: '',
          logprobs: false,
        }
      : {
          provider,
          apiKey: e.LLM_API_KEY,
          model: e.LLM_MODEL,
          baseUrl: e.LLM_BASE_URL.replace(/\/$/, ''),
          logprobs: e.LLM_LOGPROBS,
        },
    resolver: {
      maxTokens: e.RESOLVER_MAX_TOKENS,
      timeoutMs: e.RESOLVER_TIMEOUT_MS,
      maxAttempts: e.RESOLVER_MAX_ATTEMPTS,
      baseDelayMs: e.RESOLVER_BASE_DELAY_MS,
      maxDelayMs: e.RESOLVER_MAX_DELAY_MS,
      defaultConfidence: e.RESOLVER_DEFAULT_CONFIDENCE,
    },
    jobConcurrency: e.JOB_CONCURRENCY,
    maxJobRecords: e.MAX_JOB_RECORDS,
    maxJobBodyBytes: e.MAX_JOB_BODY_BYTES,
  };
}
