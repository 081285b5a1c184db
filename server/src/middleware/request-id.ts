import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const MAX_REQUEST_ID_LENGTH = 64;
const SAFE_REQUEST_ID = /^[A-Za-z0-9._:-]+$/;

/** The caller's id, trimmed and capped, or null when it carries unsafe characters. */
export function acceptRequestId(header: string | undefined): string | null {
  const candidate = header?.trim().slice(0, MAX_REQUEST_ID_LENGTH) ?? '';
  return SAFE_REQUEST_ID.test(candidate) ? candidate : null;
}

/**
 * Tags every request with an id (the caller's when acceptable) and a child
 * logger bound to it. Handlers log through `c.get('log')`.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = acceptRequestId(c.req.header('X-Request-ID')) ?? randomUUID();
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
