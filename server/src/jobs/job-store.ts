import type {
  ActionableRecord,
  AuditEvent,
  CompanyMdmDecision,
  JobReport,
  JobRunSnapshot,
  JobStatusSink,
} from '../engine/types.js';

export interface StoredJob {
  snapshot: JobRunSnapshot;
  report: JobReport | null;
  audit: AuditEvent[];
}

/**
 * Process-local job status sink. Keeps the latest snapshot, the final report
 * and the audit trail of every job started since boot.
 */
export class InMemoryJobStore implements JobStatusSink {
  private readonly jobs = new Map<string, StoredJob>();

  register(snapshot: JobRunSnapshot): void {
    this.jobs.set(snapshot.id, { snapshot, report: null, audit: [] });
  }

  onTransition(snapshot: JobRunSnapshot): void {
    this.entry(snapshot.id, snapshot).snapshot = snapshot;
  }

  onProgress(snapshot: JobRunSnapshot): void {
    this.entry(snapshot.id, snapshot).snapshot = snapshot;
  }

  onAudit(event: AuditEvent): void {
    this.jobs.get(event.job_id)?.audit.push(event);
  }

  onResults(report: JobReport): void {
    const job = this.entry(report.job.id, report.job);
    job.snapshot = report.job;
    job.report = report;
  }

  get(id: string): StoredJob | undefined {
    return this.jobs.get(id);
  }

  /** Snapshots in creation order. */
  list(): JobRunSnapshot[] {
    return [...this.jobs.values()].map((job) => job.snapshot);
  }

  records(id: string): ActionableRecord[] {
    return this.jobs.get(id)?.report?.records ?? [];
  }

  companies(id: string): CompanyMdmDecision[] {
    return this.jobs.get(id)?.report?.companies ?? [];
  }

  private entry(id: string, snapshot: JobRunSnapshot): StoredJob {
    let job = this.jobs.get(id);
    if (!job) {
      job = { snapshot, report: null, audit: [] };
      this.jobs.set(id, job);
    }
    return job;
  }
}
