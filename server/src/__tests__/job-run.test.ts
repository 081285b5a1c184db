import { describe, it, expect } from 'vitest';
import { InvalidJobTransitionError, JobRun } from '../engine/job-run.js';

function clock(...isoTimes: string[]) {
  let i = 0;
  return () => new Date(isoTimes[Math.min(i++, isoTimes.length - 1)]);
}

describe('JobRun', () => {
  it('walks pending → running → completed and reports timing', () => {
    const run = new JobRun('job-1', 2, clock(
      '2024-05-01T10:00:00.000Z',
      '2024-05-01T10:00:01.000Z',
      '2024-05-01T10:00:03.500Z',
    ));
    expect(run.status).toBe('pending');

    run.start();
    run.recordProcessed(false);
    expect(run.snapshot().completion_percentage).toBe(50);
    run.recordProcessed(true);
    run.complete();

    expect(run.snapshot()).toEqual({
      id: 'job-1',
      status: 'completed',
      total: 2,
      processed: 2,
      failed: 1,
      error: null,
      cancel_requested: false,
      created_at: '2024-05-01T10:00:00.000Z',
      started_at: '2024-05-01T10:00:01.000Z',
      completed_at: '2024-05-01T10:00:03.500Z',
      completion_percentage: 100,
      processing_time_ms: 2_500,
    });
  });

  it('rounds completion percentage to two decimals', () => {
    const run = new JobRun('job-1', 3);
    run.start();
    run.recordProcessed(false);
    expect(run.snapshot().completion_percentage).toBe(33.33);
  });

  it('never lets processed exceed total', () => {
    const run = new JobRun('job-1', 1);
    run.start();
    run.recordProcessed(false);
    expect(() => run.recordProcessed(false)).toThrow(RangeError);
    expect(run.processed).toBe(1);
  });

  it('refuses to complete before every record is processed', () => {
    const run = new JobRun('job-1', 2);
    run.start();
    run.recordProcessed(false);
    expect(() => run.complete()).toThrow('cannot complete with 1/2 processed');
    expect(run.status).toBe('running');
  });

  it('allows failing straight from pending', () => {
    const run = new JobRun('job-1', 5);
    run.fail('LLM provider is not configured');
    expect(run.status).toBe('failed');
    expect(run.error).toBe('LLM provider is not configured');
    expect(run.snapshot().processing_time_ms).toBeNull();
  });

  it('rejects transitions out of a terminal state', () => {
    const run = new JobRun('job-1', 0);
    run.start();
    run.complete();
    expect(() => run.start()).toThrow(InvalidJobTransitionError);
    expect(() => run.fail('late')).toThrow('Invalid job transition completed -> failed');
  });

  it('records cancel requests only while active', () => {
    const run = new JobRun('job-1', 1);
    run.requestCancel();
    expect(run.snapshot().cancel_requested).toBe(true);

    const done = new JobRun('job-2', 0);
    done.start();
    done.complete();
    done.requestCancel();
    expect(done.cancelRequested).toBe(false);
  });

  it('counts records only while running', () => {
    const run = new JobRun('job-1', 1);
    expect(() => run.recordProcessed(false)).toThrow(InvalidJobTransitionError);
  });
});
