import { createLogger } from '../../src/lib/logger.js';
import { CropExportError } from '../../src/lib/errors.js';
import type { ExportJob, ExportJobError, ExportJobStatus } from '../types.js';
import { isTerminalStatus } from '../types.js';

const log = createLogger('JobManager');

const CLEANUP_INTERVAL_MS = 30 * 60 * 1000;
const MAX_TERMINAL_AGE_MS = 60 * 60 * 1000;

export type JobListener = (job: ExportJob) => void;

export class JobManager {
  private jobs: Map<string, ExportJob> = new Map();
  private listeners: Map<string, Set<JobListener>> = new Map();
  private cleanupTimer: NodeJS.Timeout | null = null;

  /**
   * Create a new export job
   */
  createJob(jobId: string, sourcePath: string, outputPath: string): ExportJob {
    if (this.jobs.has(jobId)) {
      throw new CropExportError('invalid-input', `Job ${jobId} already exists`);
    }
    const job: ExportJob = {
      jobId,
      status: 'idle',
      progress: 0,
      sourcePath,
      outputPath,
      createdAt: new Date(),
    };

    this.jobs.set(jobId, job);
    log.debug(`Created job ${jobId}`);
    return job;
  }

  /**
   * Get job by ID
   */
  getJob(jobId: string): ExportJob | undefined {
    return this.jobs.get(jobId);
  }

  /**
   * Move a job to a new non-terminal state
   */
  setStatus(jobId: string, status: ExportJobStatus): ExportJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) {
      return undefined;
    }

    const updatedJob: ExportJob = {
      ...job,
      status,
      ...(job.startedAt || status === 'idle' ? {} : { startedAt: new Date() }),
    };
    log.debug(`Job ${jobId}: ${job.status} -> ${status}`);
    return this.commit(updatedJob);
  }

  /**
   * Record encoding progress. Values are clamped to [0, 1] and never move
   * backwards.
   */
  updateProgress(jobId: string, progress: number): ExportJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) {
      return undefined;
    }

    const next = Math.min(1, Math.max(job.progress, progress));
    if (next === job.progress) {
      return job;
    }
    return this.commit({ ...job, progress: next });
  }

  setMaskCount(jobId: string, maskCount: number): ExportJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      return undefined;
    }
    return this.commit({ ...job, maskCount });
  }

  /**
   * Mark job as completed
   */
  completeJob(jobId: string): ExportJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) {
      return undefined;
    }

    log.info(`Job ${jobId} completed: ${job.outputPath}`);
    return this.commit({ ...job, status: 'completed', progress: 1, completedAt: new Date() });
  }

  /**
   * Mark job as failed
   */
  failJob(jobId: string, error: ExportJobError): ExportJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) {
      return undefined;
    }

    log.error(`Job ${jobId} failed (${error.type}): ${error.message}`);
    return this.commit({ ...job, status: 'failed', error, completedAt: new Date() });
  }

  /**
   * Cancel a job
   */
  cancelJob(jobId: string): ExportJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) {
      return undefined;
    }

    log.info(`Job ${jobId} cancelled`);
    return this.commit({ ...job, status: 'cancelled', completedAt: new Date() });
  }

  /**
   * Delete a job
   */
  deleteJob(jobId: string): boolean {
    const deleted = this.jobs.delete(jobId);
    this.listeners.delete(jobId);
    if (deleted) {
      log.debug(`Deleted job ${jobId}`);
    }
    return deleted;
  }

  /**
   * Get all jobs, oldest first
   */
  getAllJobs(): ExportJob[] {
    return Array.from(this.jobs.values());
  }

  /**
   * Listen for updates to one job. Returns the unsubscribe function.
   */
  subscribe(jobId: string, listener: JobListener): () => void {
    let set = this.listeners.get(jobId);
    if (!set) {
      set = new Set();
      this.listeners.set(jobId, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(jobId);
      current?.delete(listener);
      if (current && current.size === 0) {
        this.listeners.delete(jobId);
      }
    };
  }

  /**
   * Clean up terminal jobs older than one hour
   */
  cleanupOldJobs(now: number = Date.now()): number {
    const cutoff = now - MAX_TERMINAL_AGE_MS;
    let removed = 0;

    for (const [jobId, job] of this.jobs.entries()) {
      if (isTerminalStatus(job.status) && job.completedAt && job.completedAt.getTime() < cutoff) {
        this.deleteJob(jobId);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug(`Cleaned up ${removed} old jobs`);
    }
    return removed;
  }

  /**
   * Run cleanup every 30 minutes. The timer does not keep the process alive.
   */
  startCleanup(intervalMs: number = CLEANUP_INTERVAL_MS): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.cleanupOldJobs();
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  private commit(job: ExportJob): ExportJob {
    this.jobs.set(job.jobId, job);
    const listeners = this.listeners.get(job.jobId);
    if (listeners) {
      for (const listener of [...listeners]) {
        try {
          listener(job);
        } catch (error) {
          log.warn(`Listener for job ${job.jobId} threw`, error);
        }
      }
    }
    return job;
  }
}
