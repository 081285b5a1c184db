import { Hono } from 'hono';
import { z } from 'zod';
import { parsePersonRows } from '../engine/input.js';
import type { ActionFlag } from '../engine/types.js';
import type { JobManager } from '../jobs/job-manager.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { formatIssues, validateBody } from '../lib/validate.js';

/**
 * Reconciliation job routes, mounted at /api/jobs.
 *
 * Jobs run in the background: POST answers 202 with the pending snapshot and
 * callers poll GET /:id until the status is terminal.
 */

export interface JobRouteLimits {
  maxRecords: number;
  maxBodyBytes: number;
}

const CreateJobSchema = z.object({
  records: z.array(z.unknown()),
  concurrency: z.number().int().min(1).max(50).optional(),
});

const ACTION_FLAGS: readonly ActionFlag[] = ['update_title', 'review_title', 'keep_original'];

function isActionFlag(value: string): value is ActionFlag {
  return (ACTION_FLAGS as readonly string[]).includes(value);
}

export function createJobRoutes(manager: JobManager, limits: JobRouteLimits) {
  const jobs = new Hono();

  // ---------------------------------------------------------------------------
  // POST /api/jobs — start a job
  // Body: { records: PersonRow[], concurrency? }
  // ---------------------------------------------------------------------------
  jobs.post('/', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, limits.maxBodyBytes);
    if (!parsedBody.ok) return parsedBody.response;

    const body = validateBody(CreateJobSchema, parsedBody.data);
    if (!body.success) {
      return c.json({ error: 'Invalid request body', details: formatIssues(body.issues) }, 400);
    }
    if (body.data.records.length > limits.maxRecords) {
      return c.json({ error: `Too many records (max ${limits.maxRecords} per job)` }, 400);
    }

    const rows = parsePersonRows(body.data.records);
    if (!rows.ok) {
      return c.json({ error: 'Invalid records', details: rows.issues }, 400);
    }

    const job = manager.startJob(rows.records, { concurrency: body.data.concurrency });
    c.get('log').info({ jobId: job.id, total: job.total }, 'Reconciliation job accepted');
    return c.json({ job }, 202);
  });

  // ---------------------------------------------------------------------------
  // GET /api/jobs — list job snapshots
  // ---------------------------------------------------------------------------
  jobs.get('/', (c) => c.json({ jobs: manager.store.list() }));

  // ---------------------------------------------------------------------------
  // GET /api/jobs/:id — live status
  // ---------------------------------------------------------------------------
  jobs.get('/:id', (c) => {
    const job = manager.getSnapshot(c.req.param('id'));
    if (!job) return c.json({ error: 'Job not found' }, 404);
    return c.json({ job });
  });

  // ---------------------------------------------------------------------------
  // GET /api/jobs/:id/records?flag= — actionable person table
  // ---------------------------------------------------------------------------
  jobs.get('/:id/records', (c) => {
    const id = c.req.param('id');
    const stored = manager.store.get(id);
    if (!stored) return c.json({ error: 'Job not found' }, 404);
    if (!stored.report) {
      return c.json({ error: 'Job results are not available yet', status: stored.snapshot.status }, 409);
    }

    const flag = c.req.query('flag');
    if (flag !== undefined && !isActionFlag(flag)) {
      return c.json({ error: `flag must be one of ${ACTION_FLAGS.join(', ')}` }, 400);
    }
    const records = flag
      ? stored.report.records.filter((r) => r.action_flag === flag)
      : stored.report.records;
    return c.json({ records, total: records.length });
  });

  // ---------------------------------------------------------------------------
  // GET /api/jobs/:id/companies — company MDM decisions
  // ---------------------------------------------------------------------------
  jobs.get('/:id/companies', (c) => {
    const stored = manager.store.get(c.req.param('id'));
    if (!stored) return c.json({ error: 'Job not found' }, 404);
    if (!stored.report) {
      return c.json({ error: 'Job results are not available yet', status: stored.snapshot.status }, 409);
    }
    return c.json({ companies: stored.report.companies, usage: stored.report.usage });
  });

  // ---------------------------------------------------------------------------
  // GET /api/jobs/:id/audit — audit trail
  // ---------------------------------------------------------------------------
  jobs.get('/:id/audit', (c) => {
    const stored = manager.store.get(c.req.param('id'));
    if (!stored) return c.json({ error: 'Job not found' }, 404);
    return c.json({ events: stored.audit });
  });

  // ---------------------------------------------------------------------------
  // POST /api/jobs/:id/cancel — stop dispatching new records
  // ---------------------------------------------------------------------------
  jobs.post('/:id/cancel', (c) => {
    const id = c.req.param('id');
    const result = manager.cancelJob(id);
    if (result === 'not_found') return c.json({ error: 'Job not found' }, 404);
    if (result === 'terminal') return c.json({ error: 'Job has already finished' }, 409);
    c.get('log').info({ jobId: id }, 'Reconciliation job cancel requested');
    return c.json({ job: manager.getSnapshot(id) }, 202);
  });

  return jobs;
}
