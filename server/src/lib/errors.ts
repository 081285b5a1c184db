/**
 * Error taxonomy for the reconciliation engine.
 *
 * Only SetupError escapes to the job level. Provider errors are retried or
 * folded into a manual-review outcome by the resolver. Malformed responses
 * and aggregation conflicts are values, not exceptions (see
 * engine/response-decoder.ts and engine/types.ts).
 */

export class TransientProviderError extends Error {
  readonly status?: number;
  /** Response headers, kept so the retry loop can honor Retry-After. */
  readonly headers?: Headers;

  constructor(message: string, status?: number, headers?: Headers) {
    super(message);
    this.name = 'TransientProviderError';
    this.status = status;
    this.headers = headers;
  }
}

export class ProviderTimeoutError extends TransientProviderError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Provider call timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Provider answered but with a status that retrying will not fix (401, 400, ...). */
export class ProviderRequestError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'ProviderRequestError';
    this.status = status;
  }
}

export class SetupError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SetupError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
