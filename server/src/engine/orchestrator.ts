/**
 * Job orchestrator: fans a batch of person records out to the title resolver
 * under a concurrency bound, joins on every task, then consolidates companies.
 *
 * Per-record problems never abort the batch: they are logged, counted as
 * failed and flagged for review. Only a SetupError before dispatch, or
 * cancellation, ends a run as `failed`.
 */

import { createConcurrencyLimiter } from '../lib/concurrency.js';
import { errorMessage, SetupError } from '../lib/errors.js';
import type { TokenUsage } from '../lib/llm-provider.js';
import { createJobLogger, type Logger } from '../lib/logger.js';
import { buildActionableRecord } from './action-flags.js';
import { consolidateCompanies, effectiveCompany } from './company-consolidator.js';
import type { JobRun } from './job-run.js';
import type { ResolveCallOptions } from './resolver.js';
import type { PersonContext } from './prompts.js';
import { classifyTrigger } from './trigger-classifier.js';
import type {
  ActionableRecord,
  AuditAction,
  CompanyMdmDecision,
  JobReport,
  JobStatusSink,
  PersonRecord,
  ResolutionMode,
  ResolutionResult,
  TriggerClassification,
} from './types.js';

export interface Resolver {
  resolve(context: PersonContext, mode: ResolutionMode, options?: ResolveCallOptions): Promise<ResolutionResult>;
}

export interface OrchestratorDeps {
  /** Called once before dispatch; throwing SetupError fails the run. */
  createResolver: () => Resolver;
  concurrency: number;
  sink?: JobStatusSink;
  logger?: Logger;
}

export interface RunJobOptions {
  signal?: AbortSignal;
}

export const CANCELLED_ERROR = 'cancelled';

// ─── Per-record processing ───────────────────────────────────────────

function recoveredRecord(
  record: PersonRecord,
  classification: TriggerClassification,
  err: unknown,
): ActionableRecord {
  const resolution: ResolutionResult | null = classification.mode
    ? {
        mode: classification.mode,
        resolved_title: null,
        confidence: 0,
        review_required: true,
        raw_model_output: '',
        outcome: 'provider_failure',
        attempts: 0,
        error: errorMessage(err),
        usage: { input_tokens: 0, output_tokens: 0 },
      }
    : null;
  return {
    ...record,
    scenario: classification.scenario,
    resolved_title: null,
    action_flag: 'review_title',
    resolution,
    company_key: effectiveCompany(record).key,
    failed: true,
  };
}

async function processRecord(
  record: PersonRecord,
  resolver: Resolver,
  shouldContinue: () => boolean,
  signal: AbortSignal | undefined,
  log: Logger,
): Promise<ActionableRecord> {
  const classification = classifyTrigger(record);
  const recordLog = log.child({ personId: record.person_id });
  try {
    const resolution = classification.requires_resolution
      ? await resolver.resolve(record, classification.mode, { shouldContinue, signal, log: recordLog })
      : null;
    return buildActionableRecord(record, classification, resolution);
  } catch (err) {
    recordLog.error({ err }, 'Unexpected error while processing record; flagging for review');
    return recoveredRecord(record, classification, err);
  }
}

function sumUsage(records: readonly ActionableRecord[]): TokenUsage {
  return records.reduce<TokenUsage>(
    (acc, r) => ({
      input_tokens: acc.input_tokens + (r.resolution?.usage.input_tokens ?? 0),
      output_tokens: acc.output_tokens + (r.resolution?.usage.output_tokens ?? 0),
    }),
    { input_tokens: 0, output_tokens: 0 },
  );
}

/** Points each person row at the company group it was consolidated into. */
function withGroupKeys(
  records: readonly ActionableRecord[],
  companies: readonly CompanyMdmDecision[],
): ActionableRecord[] {
  const groupOf = new Map<string, string>();
  for (const company of companies) {
    for (const personId of company.person_ids) groupOf.set(personId, company.company_key);
  }
  return records.map((record) => ({
    ...record,
    company_key: groupOf.get(record.person_id) ?? record.company_key,
  }));
}

function prepareResolver(
  run: JobRun,
  records: readonly PersonRecord[],
  deps: OrchestratorDeps,
): { ok: true; resolver: Resolver } | { ok: false; error: SetupError } {
  try {
    if (records.length !== run.total) {
      throw new SetupError('Record count does not match job total', [
        `expected ${run.total}, received ${records.length}`,
      ]);
    }
    return { ok: true, resolver: deps.createResolver() };
  } catch (err) {
    const error = err instanceof SetupError
      ? err
      : new SetupError('Resolver setup failed', [errorMessage(err)]);
    return { ok: false, error };
  }
}

// ─── Job run ─────────────────────────────────────────────────────────

/**
 * Run one reconciliation job to a terminal state and return its report.
 * Resolves for every outcome; the run's status tells completed from failed.
 */
export async function runReconciliationJob(
  run: JobRun,
  records: readonly PersonRecord[],
  deps: OrchestratorDeps,
  options: RunJobOptions = {},
): Promise<JobReport> {
  const log = deps.logger ?? createJobLogger(run.id);
  const { sink, concurrency } = deps;
  const signal = options.signal;

  const notify = async (event: string, fn: (s: JobStatusSink) => void | Promise<void>) => {
    if (!sink) return;
    try {
      await fn(sink);
    } catch (err) {
      log.error({ err, event }, 'Job status sink failed');
    }
  };

  const audit = (action: AuditAction, personId: string | null, details: Record<string, unknown>) =>
    notify('audit', (s) => s.onAudit({
      job_id: run.id,
      person_id: personId,
      action,
      details,
      created_at: new Date().toISOString(),
    }));

  const finish = async (
    actionable: ActionableRecord[],
    companies: CompanyMdmDecision[],
  ): Promise<JobReport> => {
    const report: JobReport = {
      job: run.snapshot(),
      records: actionable,
      companies,
      usage: sumUsage(actionable),
    };
    await notify('transition', (s) => s.onTransition(report.job));
    await notify('results', (s) => s.onResults(report));
    return report;
  };

  // ─── Setup check ───────────────────────────────────────────────────
  const setup = prepareResolver(run, records, deps);
  if (!setup.ok) {
    const { error } = setup;
    log.error({ issues: error.issues }, error.message);
    run.fail(error.message);
    await audit('job_failed', null, { error: error.message, issues: error.issues });
    return finish([], []);
  }
  const { resolver } = setup;

  run.start();
  await notify('transition', (s) => s.onTransition(run.snapshot()));
  await audit('job_started', null, { total: run.total, concurrency });
  log.info({ total: run.total, concurrency }, 'Reconciliation job started');

  const onAbort = () => run.requestCancel();
  signal?.addEventListener('abort', onAbort, { once: true });
  const shouldContinue = () => !signal?.aborted;

  // ─── Fan out, then join on every task ──────────────────────────────
  const limit = createConcurrencyLimiter(concurrency);
  const results: Array<ActionableRecord | undefined> = new Array(records.length);

  try {
    await Promise.all(records.map((record, index) => limit(async () => {
      if (!shouldContinue()) return;
      const actionable = await processRecord(record, resolver, shouldContinue, signal, log);
      results[index] = actionable;
      run.recordProcessed(actionable.failed);
      const progress = run.snapshot();

      const resolution = actionable.resolution;
      if (resolution || actionable.failed) {
        await audit(actionable.failed ? 'record_failed' : 'record_resolved', record.person_id, {
          scenario: actionable.scenario,
          outcome: resolution?.outcome ?? null,
          action_flag: actionable.action_flag,
          resolved_title: actionable.resolved_title,
          attempts: resolution?.attempts ?? 0,
          error: resolution?.error ?? null,
        });
      }
      await notify('progress', (s) => s.onProgress(progress));
    })));
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  const actionable = results.filter((r): r is ActionableRecord => r !== undefined);
  const interrupted = actionable.filter((r) => r.resolution?.outcome === 'cancelled').length;

  // A record whose retries were cut short counts as processed, but the run
  // still did not finish its work.
  if (run.processed < run.total || (signal?.aborted === true && interrupted > 0)) {
    log.warn({ processed: run.processed, total: run.total, interrupted }, 'Reconciliation job cancelled');
    run.fail(CANCELLED_ERROR);
    await audit('job_failed', null, { error: CANCELLED_ERROR, processed: run.processed, total: run.total });
    return finish(actionable, []);
  }

  // ─── Consolidate ───────────────────────────────────────────────────
  const conflictAudits: Array<Promise<void>> = [];
  const { companies, conflicts } = consolidateCompanies(actionable, {
    log,
    onConflict: (conflict) => {
      conflictAudits.push(audit('aggregation_conflict', conflict.person_id, { ...conflict }));
    },
  });
  await Promise.all(conflictAudits);
  const joined = withGroupKeys(actionable, companies);

  run.complete();
  await audit('job_completed', null, {
    processed: run.processed,
    failed: run.failed,
    companies: companies.length,
    conflicts: conflicts.length,
  });
  log.info(
    { processed: run.processed, failed: run.failed, companies: companies.length },
    'Reconciliation job completed',
  );
  return finish(joined, companies);
}
