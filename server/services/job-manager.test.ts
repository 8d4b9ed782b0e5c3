import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CropExportError } from '../../src/lib/errors.js';
import type { ExportJobStatus } from '../types.js';
import { JobManager } from './job-manager.js';

describe('JobManager', () => {
  let jobs: JobManager;

  beforeEach(() => {
    jobs = new JobManager();
    jobs.createJob('job-1', '/in/source.mp4', '/out/cropped.mp4');
  });

  afterEach(() => {
    jobs.stopCleanup();
  });

  it('creates idle jobs with zero progress', () => {
    const job = jobs.getJob('job-1');
    expect(job?.status).toBe('idle');
    expect(job?.progress).toBe(0);
    expect(job?.startedAt).toBeUndefined();
  });

  it('rejects duplicate job ids', () => {
    expect(() => jobs.createJob('job-1', 'a.mp4', 'b.mp4')).toThrow(CropExportError);
  });

  it('stamps startedAt on the first active state', () => {
    const validating = jobs.setStatus('job-1', 'validating');
    const startedAt = validating?.startedAt;
    expect(startedAt).toBeInstanceOf(Date);
    expect(jobs.setStatus('job-1', 'encoding')?.startedAt).toBe(startedAt);
  });

  it('keeps progress monotonic and clamped', () => {
    jobs.updateProgress('job-1', 0.4);
    jobs.updateProgress('job-1', 0.2);
    expect(jobs.getJob('job-1')?.progress).toBe(0.4);
    jobs.updateProgress('job-1', 3);
    expect(jobs.getJob('job-1')?.progress).toBe(1);
  });

  it('notifies only on real progress changes', () => {
    const seen: number[] = [];
    jobs.subscribe('job-1', (job) => seen.push(job.progress));
    jobs.updateProgress('job-1', 0.5);
    jobs.updateProgress('job-1', 0.5);
    jobs.updateProgress('job-1', 0.1);
    expect(seen).toEqual([0.5]);
  });

  it('freezes terminal jobs', () => {
    jobs.completeJob('job-1');
    expect(jobs.setStatus('job-1', 'encoding')).toBeUndefined();
    expect(jobs.failJob('job-1', { type: 'invalid-input', message: 'late' })).toBeUndefined();
    expect(jobs.cancelJob('job-1')).toBeUndefined();

    const job = jobs.getJob('job-1');
    expect(job?.status).toBe('completed');
    expect(job?.progress).toBe(1);
    expect(job?.completedAt).toBeInstanceOf(Date);
  });

  it('records failure details', () => {
    const failed = jobs.failJob('job-1', {
      type: 'encoder-process-failure',
      message: 'Encoder exited with code 1',
      exitCode: 1,
      diagnostics: 'Conversion failed!',
    });
    expect(failed?.status).toBe('failed');
    expect(failed?.error?.exitCode).toBe(1);
  });

  it('delivers updates until unsubscribed', () => {
    const statuses: ExportJobStatus[] = [];
    const unsubscribe = jobs.subscribe('job-1', (job) => statuses.push(job.status));
    jobs.setStatus('job-1', 'validating');
    unsubscribe();
    jobs.setStatus('job-1', 'encoding');
    expect(statuses).toEqual(['validating']);
  });

  it('keeps notifying when a listener throws', () => {
    const statuses: ExportJobStatus[] = [];
    jobs.subscribe('job-1', () => {
      throw new Error('listener failure');
    });
    jobs.subscribe('job-1', (job) => statuses.push(job.status));
    jobs.cancelJob('job-1');
    expect(statuses).toEqual(['cancelled']);
  });

  it('removes terminal jobs older than an hour', () => {
    jobs.createJob('job-2', 'a.mp4', 'b.mp4');
    jobs.createJob('job-3', 'c.mp4', 'd.mp4');
    jobs.completeJob('job-1');
    jobs.cancelJob('job-2');

    const completedAt = jobs.getJob('job-1')?.completedAt?.getTime() ?? 0;
    expect(jobs.cleanupOldJobs(completedAt + 30 * 60 * 1000)).toBe(0);
    expect(jobs.cleanupOldJobs(completedAt + 2 * 60 * 60 * 1000)).toBe(2);
    expect(jobs.getAllJobs().map((job) => job.jobId)).toEqual(['job-3']);
  });
});
