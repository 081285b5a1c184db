import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createJobRoutes } from './routes/jobs.js';
import { JobManager } from './jobs/job-manager.js';
import { InMemoryJobStore } from './jobs/job-store.js';
import { loadConfig, type EngineConfig } from './lib/config.js';
import logger from './lib/logger.js';

const startTime = Date.now();
let shuttingDown = false;

function getHeapUsedMb() {
  return Math.round(process.memoryUsage().heapUsed / 1024 / 1024);
}

/**
 * Build the HTTP app around a job manager. Kept separate from the module
 * singleton so tests can mount their own manager.
 */
export function createApp(manager: JobManager, config: EngineConfig) {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (shuttingDown && c.req.path !== '/health' && c.req.method !== 'GET') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const llmKeyPresent = Boolean(config.llm.apiKey);
    const status = shuttingDown ? 'draining' : (llmKeyPresent ? 'ok' : 'degraded');
    return c.json({
      status,
      shutting_down: shuttingDown,
      llm_provider: config.llm.provider,
      llm_key_present: llmKeyPresent,
      active_jobs: manager.activeCount,
      heap_used_mb: getHeapUsedMb(),
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/jobs', createJobRoutes(manager, {
    maxRecords: config.maxJobRecords,
    maxBodyBytes: config.maxJobBodyBytes,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId, path: c.req.path, method: c.req.method }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

const config = loadConfig();
const manager = new JobManager({ config, store: new InMemoryJobStore() });
const app = createApp(manager, config);

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  const cancelled = manager.cancelAll();
  logger.info({ signal, cancelled_jobs: cancelled }, 'Graceful shutdown initiated');

  // In-flight provider calls finish or time out before the runs settle.
  const drained = manager.drain().catch((err: unknown) => {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Job drain failed');
  });

  server.close(() => {
    void Promise.race([
      drained,
      new Promise((resolve) => setTimeout(resolve, config.resolver.timeoutMs)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit if connections or jobs don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, config.resolver.timeoutMs + 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const { port } = config;
  logger.info({ port, llm_provider: config.llm.provider }, 'Title reconciliation server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
