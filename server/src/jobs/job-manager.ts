import { randomUUID } from 'node:crypto';
import type { EngineConfig } from '../lib/config.js';
import { createProvider } from '../lib/llm.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import { createJobLogger } from '../lib/logger.js';
import { JobRun } from '../engine/job-run.js';
import { runReconciliationJob, type Resolver } from '../engine/orchestrator.js';
import { TitleResolver } from '../engine/resolver.js';
import type { JobReport, JobRunSnapshot, PersonRecord } from '../engine/types.js';
import type { InMemoryJobStore } from './job-store.js';

export interface JobManagerOptions {
  config: EngineConfig;
  store: InMemoryJobStore;
  /** Defaults to the configured provider; throws SetupError without an API key. */
  createProvider?: (config: EngineConfig['llm']) => LLMProvider;
  /** Overrides the resolver built from the provider, mainly for tests. */
  createResolver?: () => Resolver;
  idFactory?: () => string;
}

export interface StartJobOptions {
  concurrency?: number;
}

export type CancelResult = 'cancelling' | 'not_found' | 'terminal';

interface ActiveJob {
  run: JobRun;
  controller: AbortController;
  done: Promise<JobReport | null>;
}

/**
 * Owns running jobs: creates the JobRun, wires the resolver and the store,
 * and keeps the abort handle until the run reaches a terminal state.
 */
export class JobManager {
  private readonly options: JobManagerOptions;
  private readonly active = new Map<string, ActiveJob>();

  constructor(options: JobManagerOptions) {
    this.options = options;
  }

  get store(): InMemoryJobStore {
    return this.options.store;
  }

  get activeCount(): number {
    return this.active.size;
  }

  startJob(records: PersonRecord[], options: StartJobOptions = {}): JobRunSnapshot {
    const { config, store } = this.options;
    const id = this.options.idFactory?.() ?? randomUUID();
    const run = new JobRun(id, records.length);
    const controller = new AbortController();
    const log = createJobLogger(id);
    const concurrency = options.concurrency ?? config.jobConcurrency;

    const initial = run.snapshot();
    store.register(initial);

    const done = runReconciliationJob(
      run,
      records,
      {
        createResolver: () => this.buildResolver(),
        concurrency,
        sink: store,
        logger: log,
      },
      { signal: controller.signal },
    )
      .catch((err: unknown) => {
        log.error({ err }, 'Reconciliation job crashed');
        if (!run.isTerminal) {
          run.fail(err instanceof Error ? err.message : String(err));
          store.onTransition(run.snapshot());
        }
        return null;
      })
      .finally(() => {
        this.active.delete(id);
      });

    this.active.set(id, { run, controller, done });
    return initial;
  }

  getSnapshot(id: string): JobRunSnapshot | undefined {
    return this.active.get(id)?.run.snapshot() ?? this.options.store.get(id)?.snapshot;
  }

  cancelJob(id: string): CancelResult {
    const job = this.active.get(id);
    if (!job) {
      return this.options.store.get(id) ? 'terminal' : 'not_found';
    }
    if (job.run.isTerminal) return 'terminal';
    job.run.requestCancel();
    job.controller.abort();
    return 'cancelling';
  }

  cancelAll(): number {
    let cancelled = 0;
    for (const id of this.active.keys()) {
      if (this.cancelJob(id) === 'cancelling') cancelled += 1;
    }
    return cancelled;
  }

  /** Resolves once the job has reached a terminal state (undefined if unknown). */
  async waitForJob(id: string): Promise<JobReport | null | undefined> {
    const job = this.active.get(id);
    if (!job) return this.options.store.get(id)?.report ?? undefined;
    return job.done;
  }

  async drain(): Promise<void> {
    await Promise.all([...this.active.values()].map((job) => job.done));
  }

  private buildResolver(): Resolver {
    if (this.options.createResolver) return this.options.createResolver();
    const { config } = this.options;
    const factory = this.options.createProvider ?? createProvider;
    return TitleResolver.fromConfig(factory(config.llm), config.llm.model, config.resolver);
  }
}
