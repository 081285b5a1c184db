import { ProviderRequestError, TransientProviderError } from './errors.js';
import { sleep as defaultSleep } from './sleep.js';

// ─── Failure classification ──────────────────────────────────────────

/** `transient` failures may be attempted again; `final` ones end the machine. */
export type FailureKind = 'transient' | 'final';

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const RETRYABLE_NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const RETRYABLE_MESSAGE =
  /rate[ _]limit|too many requests|overloaded|temporarily unavailable|service unavailable|gateway timeout|bad gateway|time ?out|timed out|socket hang up|fetch failed|network error|\b(?:408|425|429|50[0234]|529)\b/i;
const RETRY_AFTER_CAP_MS = 60_000;

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

/** Reads a property off an unknown thrown value without trusting its shape. */
function prop(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function statusOf(failure: unknown): number | null {
  for (const candidate of [prop(failure, 'status'), prop(failure, 'statusCode'), prop(prop(failure, 'response'), 'status')]) {
    if (typeof candidate === 'number') return candidate;
  }
  return null;
}

/**
 * Sorts a failed attempt into the machine's two kinds. Aborts and 4xx
 * request errors are final; throttling, timeouts, 5xx and dropped
 * connections are transient.
 */
export function classifyFailure(failure: unknown): FailureKind {
  if (failure instanceof TransientProviderError) return 'transient';
  if (failure instanceof Error && failure.name === 'AbortError') return 'final';

  const status = statusOf(failure);
  if (status !== null) return isRetryableStatus(status) ? 'transient' : 'final';
  if (failure instanceof ProviderRequestError) return 'final';

  const code = prop(failure, 'code');
  if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.has(code.toUpperCase())) return 'transient';

  const message = failure instanceof Error ? failure.message : String(failure);
  return RETRYABLE_MESSAGE.test(message) ? 'transient' : 'final';
}

/** Server-requested wait in ms from a `retry-after` header, 0 when absent. */
function retryAfterMs(failure: unknown): number {
  for (const bag of [prop(failure, 'headers'), prop(prop(failure, 'response'), 'headers')]) {
    const raw = headerValue(bag, 'retry-after');
    if (raw === null) continue;
    const seconds = Number.parseFloat(raw);
    return Number.isFinite(seconds) && seconds > 0 ? Math.min(seconds * 1000, RETRY_AFTER_CAP_MS) : 0;
  }
  return 0;
}

function headerValue(bag: unknown, name: string): string | null {
  if (bag instanceof Headers) return bag.get(name);
  if (typeof bag !== 'object' || bag === null) return null;
  const entry = Object.entries(bag).find(([key]) => key.toLowerCase() === name);
  return entry && typeof entry[1] === 'string' ? entry[1] : null;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ─── Backoff policy ──────────────────────────────────────────────────

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelay: 1_000,
  maxDelay: 10_000,
};

/**
 * Delay before the attempt that follows `attempt`. A server-specified
 * Retry-After wins; otherwise exponential backoff with 0.5x–1.5x jitter,
 * capped at `policy.maxDelay`.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  error?: unknown,
  random: () => number = Math.random,
): number {
  const requested = retryAfterMs(error);
  if (requested > 0) return requested;

  const exponential = policy.baseDelay * Math.pow(2, attempt - 1);
  return Math.min(Math.round(exponential * (0.5 + random())), policy.maxDelay);
}

// ─── State machine ───────────────────────────────────────────────────
// attempt ──fail──▶ wait ──▶ retry ──▶ attempt ...
//    │                         │
//    └──success / final──▶ give_up (or done)

export type GiveUpReason = 'exhausted' | 'non_transient' | 'cancelled';

export type RetryStep =
  | { kind: 'retry'; attempt: number; delayMs: number }
  | { kind: 'give_up'; attempt: number; reason: GiveUpReason };

export type RetryState =
  | { phase: 'attempt'; attempt: number }
  | { phase: 'wait'; attempt: number; delayMs: number; error: Error }
  | { phase: 'retry'; attempt: number; error: Error }
  | { phase: 'give_up'; attempt: number; error: Error; reason: GiveUpReason };

/**
 * Transition taken after attempt number `attempt` failed with `error`.
 */
export function nextRetryStep(
  attempt: number,
  error: unknown,
  policy: RetryPolicy,
  context: { cancelled?: boolean; random?: () => number } = {},
): RetryStep {
  if (classifyFailure(error) === 'final') {
    return { kind: 'give_up', attempt, reason: 'non_transient' };
  }
  if (attempt >= policy.maxAttempts) {
    return { kind: 'give_up', attempt, reason: 'exhausted' };
  }
  if (context.cancelled) {
    return { kind: 'give_up', attempt, reason: 'cancelled' };
  }
  return {
    kind: 'retry',
    attempt,
    delayMs: computeBackoffDelay(attempt, policy, error, context.random),
  };
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number; reason: GiveUpReason };

export interface RetryOptions {
  policy?: RetryPolicy;
  /** Checked before every new attempt; returning false gives up with `cancelled`. */
  shouldContinue?: () => boolean;
  /** Cuts the backoff wait short; the next check then gives up with `cancelled`. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: Error) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Drive `fn` through the retry state machine. Never throws: the caller gets
 * either the value or the last error with the reason the machine stopped.
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? defaultSleep;
  const isCancelled = () =>
    options.signal?.aborted === true || (options.shouldContinue ? !options.shouldContinue() : false);

  let state: RetryState = { phase: 'attempt', attempt: 1 };

  for (;;) {
    switch (state.phase) {
      case 'attempt': {
        const { attempt }: { attempt: number } = state;
        try {
          const value = await fn(attempt);
          return { ok: true, value, attempts: attempt };
        } catch (err) {
          const error = toError(err);
          const step = nextRetryStep(attempt, err, policy, {
            cancelled: isCancelled(),
            random: options.random,
          });
          state = step.kind === 'retry'
            ? { phase: 'wait', attempt, delayMs: step.delayMs, error }
            : { phase: 'give_up', attempt, error, reason: step.reason };
        }
        break;
      }
      case 'wait': {
        options.onRetry?.(state.attempt, state.delayMs, state.error);
        await wait(state.delayMs, options.signal);
        state = { phase: 'retry', attempt: state.attempt, error: state.error };
        break;
      }
      case 'retry': {
        state = isCancelled()
          ? { phase: 'give_up', attempt: state.attempt, error: state.error, reason: 'cancelled' }
          : { phase: 'attempt', attempt: state.attempt + 1 };
        break;
      }
      case 'give_up':
        return { ok: false, error: state.error, attempts: state.attempt, reason: state.reason };
    }
  }
}
