import type { JobRunSnapshot, JobStatus } from './types.js';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export class InvalidJobTransitionError extends Error {
  constructor(from: JobStatus, to: JobStatus) {
    super(`Invalid job transition ${from} -> ${to}`);
    this.name = 'InvalidJobTransitionError';
  }
}

/**
 * Shared state of one reconciliation job. Counters and status change only
 * through these methods, so `processed <= total` holds at every observation.
 */
export class JobRun {
  readonly id: string;
  readonly total: number;
  private _status: JobStatus = 'pending';
  private _processed = 0;
  private _failed = 0;
  private _error: string | null = null;
  private _cancelRequested = false;
  private readonly createdAt: Date;
  private startedAt: Date | null = null;
  private completedAt: Date | null = null;
  private readonly now: () => Date;

  constructor(id: string, total: number, now: () => Date = () => new Date()) {
    if (!Number.isInteger(total) || total < 0) {
      throw new RangeError(`Job total must be a non-negative integer, got ${total}`);
    }
    this.id = id;
    this.total = total;
    this.now = now;
    this.createdAt = now();
  }

  get status(): JobStatus {
    return this._status;
  }

  get processed(): number {
    return this._processed;
  }

  get failed(): number {
    return this._failed;
  }

  get error(): string | null {
    return this._error;
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  get isTerminal(): boolean {
    return this._status === 'completed' || this._status === 'failed';
  }

  start(): void {
    this.transition('running');
    this.startedAt = this.now();
  }

  /** Count one finished record; `failed` marks a resolution that could not complete. */
  recordProcessed(failed: boolean): void {
    if (this._status !== 'running') {
      throw new InvalidJobTransitionError(this._status, this._status);
    }
    if (this._processed >= this.total) {
      throw new RangeError(`Job ${this.id} already processed all ${this.total} records`);
    }
    this._processed += 1;
    if (failed) this._failed += 1;
  }

  complete(): void {
    if (this._processed !== this.total) {
      throw new RangeError(`Job ${this.id} cannot complete with ${this._processed}/${this.total} processed`);
    }
    this.transition('completed');
    this.completedAt = this.now();
  }

  fail(error: string): void {
    this.transition('failed');
    this._error = error;
    this.completedAt = this.now();
  }

  requestCancel(): void {
    if (!this.isTerminal) this._cancelRequested = true;
  }

  snapshot(): JobRunSnapshot {
    const percentage = this.total === 0
      ? (this._status === 'completed' ? 100 : 0)
      : Math.round((this._processed / this.total) * 10_000) / 100;
    return {
      id: this.id,
      status: this._status,
      total: this.total,
      processed: this._processed,
      failed: this._failed,
      error: this._error,
      cancel_requested: this._cancelRequested,
      created_at: this.createdAt.toISOString(),
      started_at: this.startedAt?.toISOString() ?? null,
      completed_at: this.completedAt?.toISOString() ?? null,
      completion_percentage: percentage,
      processing_time_ms: this.startedAt && this.completedAt
        ? this.completedAt.getTime() - this.startedAt.getTime()
        : null,
    };
  }

  private transition(to: JobStatus): void {
    if (!ALLOWED_TRANSITIONS[this._status].includes(to)) {
      throw new InvalidJobTransitionError(this._status, to);
    }
    this._status = to;
  }
}
