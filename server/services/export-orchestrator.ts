/**
 * Export Orchestrator
 *
 * Runs queued export jobs through
 *   validating -> mask-preparation -> graph-building -> encoding
 * and settles each on completed, failed or cancelled. Jobs start in FIFO
 * order with at most `concurrency` running at once; each job owns its
 * AbortController and its mask directory, and nothing else is shared.
 */

import { randomUUID } from 'crypto';
import { createLogger } from '../../src/lib/logger.js';
import { CropExportError, isCropExportError, toCropExportError } from '../../src/lib/errors.js';
import { assertValidTimeline } from '../../src/features/keyframes/utils/timeline-operations.js';
import { evenSourceSize } from '../../src/features/export/utils/dimensions.js';
import { selectEncoder } from '../../src/features/export/utils/encoder-selection.js';
import { buildFilterGraph, requiresMask } from '../../src/features/export/utils/filter-graph.js';
import { planMasks, type MaskPlan } from '../../src/features/export/utils/mask-plan.js';
import { rasterizeMask } from '../../src/features/masks/utils/rasterize.js';
import type { ExportSettings, SourceVideoProperties } from '../../src/types/export.js';
import type { ExportJob, ExportJobError, ExportJobHandle, ExportOutcome, ExportRequest } from '../types.js';
import type { JobManager } from './job-manager.js';
import type { MediaProber } from './ffprobe-service.js';
import type { VideoEncoder } from './ffmpeg-encoder.js';
import type { MaskWriter, WrittenMasks } from './mask-store.js';
import { runWithConcurrency } from './worker-pool.js';

const log = createLogger('ExportOrchestrator');

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export interface OrchestratorOptions {
  jobs: JobManager;
  prober: MediaProber;
  encoder: VideoEncoder;
  masks: MaskWriter;
  /** Jobs allowed to run at once */
  concurrency: number;
  /** Rasterization tasks in flight per job */
  maskWorkers: number;
  /** Leave mask files on disk after the job ends */
  keepMasks?: boolean;
}

interface QueuedJob {
  jobId: string;
  request: ExportRequest;
  controller: AbortController;
  resolve: (outcome: ExportOutcome) => void;
}

function toJobError(error: CropExportError): ExportJobError {
  const jobError: ExportJobError = { type: error.type, message: error.message };
  if (error.details.exitCode !== undefined) jobError.exitCode = error.details.exitCode;
  if (error.details.diagnostics !== undefined) jobError.diagnostics = error.details.diagnostics;
  return jobError;
}

/**
 * Checks that need no I/O. Failing any of them rejects the request before
 * a job is created.
 */
export function validateExportRequest(request: ExportRequest): void {
  if (!request.sourcePath || !request.outputPath) {
    throw new CropExportError('invalid-input', 'Both sourcePath and outputPath are required');
  }
  if (request.sourcePath === request.outputPath) {
    throw new CropExportError('invalid-input', 'Output path must differ from the source path');
  }
  assertValidTimeline(request.timeline, request.source?.durationSeconds === undefined
    ? {}
    : { durationSeconds: request.source.durationSeconds });
  const { backgroundColor } = request.settings;
  if (backgroundColor !== undefined && !HEX_COLOR.test(backgroundColor)) {
    throw new CropExportError('invalid-input', `Background colour must be #rrggbb, got "${backgroundColor}"`);
  }
}

export class ExportOrchestrator {
  private readonly queue: QueuedJob[] = [];
  private readonly running = new Map<string, QueuedJob>();
  private readonly idleWaiters: Array<() => void> = [];

  constructor(private readonly options: OrchestratorOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new CropExportError('invalid-input', `Concurrency must be a positive integer, got ${options.concurrency}`);
    }
  }

  /**
   * Queue an export. Structural problems throw here; everything found
   * later arrives on `done`, which never rejects.
   */
  enqueue(request: ExportRequest): ExportJobHandle {
    validateExportRequest(request);

    const jobId = request.jobId ?? randomUUID();
    this.options.jobs.createJob(jobId, request.sourcePath, request.outputPath);

    let resolveOutcome: (outcome: ExportOutcome) => void = () => undefined;
    const done = new Promise<ExportOutcome>((resolve) => {
      resolveOutcome = resolve;
    });

    this.queue.push({ jobId, request, controller: new AbortController(), resolve: resolveOutcome });
    log.debug(`Queued job ${jobId} (${this.queue.length} waiting, ${this.running.size} running)`);
    this.pump();
    return { jobId, done };
  }

  /**
   * Cancel a queued or running job. Returns false when the job is unknown
   * or already finished.
   */
  cancel(jobId: string): boolean {
    const queuedIndex = this.queue.findIndex((job) => job.jobId === jobId);
    const queued = this.queue[queuedIndex];
    if (queued) {
      this.queue.splice(queuedIndex, 1);
      queued.controller.abort();
      this.settleCancelled(queued);
      this.notifyIfIdle();
      return true;
    }

    const active = this.running.get(jobId);
    if (active && !active.controller.signal.aborted) {
      log.debug(`Cancelling running job ${jobId}`);
      active.controller.abort();
      return true;
    }
    return false;
  }

  /** Cancel everything and wait for running jobs to tear down */
  async shutdown(): Promise<void> {
    for (const job of [...this.queue]) {
      this.cancel(job.jobId);
    }
    for (const jobId of [...this.running.keys()]) {
      this.cancel(jobId);
    }
    await this.whenIdle();
  }

  /** Resolves once nothing is queued or running */
  whenIdle(): Promise<void> {
    if (this.queue.length === 0 && this.running.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get runningCount(): number {
    return this.running.size;
  }

  private pump(): void {
    while (this.running.size < this.options.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      this.running.set(next.jobId, next);
      void this.run(next)
        .catch((error: unknown) => {
          log.error(`Job ${next.jobId} crashed`, error);
        })
        .finally(() => {
          this.running.delete(next.jobId);
          this.pump();
          this.notifyIfIdle();
        });
    }
  }

  private notifyIfIdle(): void {
    if (this.queue.length > 0 || this.running.size > 0) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  private async run(job: QueuedJob): Promise<void> {
    const { jobId, request, controller } = job;
    const { jobs } = this.options;
    const signal = controller.signal;
    let written: WrittenMasks | undefined;

    const enter = (status: ExportJob['status']): void => {
      if (signal.aborted) throw new CropExportError('cancelled');
      jobs.setStatus(jobId, status);
    };

    try {
      log.debug(`Starting job ${jobId} (${settingsSummary(request.settings)})`);
      enter('validating');
      const source = await this.resolveSource(request);
      const frame = evenSourceSize(source.width, source.height);
      if (!(source.frameRate > 0)) {
        throw new CropExportError('invalid-input', `Invalid source frame rate ${source.frameRate}`);
      }
      if (source.durationSeconds !== undefined && request.source?.durationSeconds === undefined) {
        assertValidTimeline(request.timeline, { durationSeconds: source.durationSeconds });
      }

      const plan = planMasks(request.timeline, {
        width: frame.width,
        height: frame.height,
        frameRate: source.frameRate,
        ...(source.durationSeconds === undefined ? {} : { durationSeconds: source.durationSeconds }),
      });
      const masked = requiresMask(plan.summary, request.settings);

      if (masked) {
        enter('mask-preparation');
        // fail on codecs without alpha before spending time on masks
        selectEncoder(source, request.settings, request.settings.enableAlpha);
        written = await this.prepareMasks(jobId, request, plan, frame, source, signal);
        jobs.setMaskCount(jobId, written.fileCount);
      }

      enter('graph-building');
      const spec = buildFilterGraph(source, request.settings, plan.summary, written?.input);

      enter('encoding');
      const { durationSeconds } = source;
      await this.options.encoder.encode({
        spec,
        invocation: {
          sourcePath: request.sourcePath,
          outputPath: request.outputPath,
          ...(written ? { maskPath: written.path } : {}),
          ...(durationSeconds === undefined ? {} : { durationSeconds }),
        },
        // unknown duration: progress only reports completion
        durationSeconds: durationSeconds ?? 0,
        onProgress: (fraction) => {
          jobs.updateProgress(jobId, fraction);
        },
        signal,
      });

      if (signal.aborted) throw new CropExportError('cancelled');
      const completed = jobs.completeJob(jobId);
      if (completed) job.resolve({ status: 'completed', job: completed });
    } catch (error) {
      if (signal.aborted || isCropExportError(error, 'cancelled')) {
        this.settleCancelled(job);
      } else {
        const failure = toCropExportError(error);
        const jobError = toJobError(failure);
        const failed = jobs.failJob(jobId, jobError);
        if (failed) job.resolve({ status: 'failed', job: failed, error: jobError });
      }
    } finally {
      if (written && !this.options.keepMasks) {
        await this.options.masks.release(written).catch((error: unknown) => {
          log.warn(`Could not remove masks for job ${jobId}`, error);
        });
      } else if (written) {
        log.info(`Keeping masks for job ${jobId} in ${written.directory}`);
      }
    }
  }

  /**
   * Source properties from the request, or from the file. A supplied source
   * without a duration still has its duration read from the file.
   */
  private async resolveSource(request: ExportRequest): Promise<SourceVideoProperties> {
    const supplied = request.source;
    if (!supplied) return this.options.prober.probe(request.sourcePath);
    if (supplied.durationSeconds !== undefined) return supplied;

    const probed = await this.options.prober.probe(request.sourcePath);
    if (probed.durationSeconds === undefined) {
      log.debug(`Duration of ${request.sourcePath} is unknown`);
      return supplied;
    }
    return { ...supplied, durationSeconds: probed.durationSeconds };
  }

  private async prepareMasks(
    jobId: string,
    request: ExportRequest,
    plan: MaskPlan,
    frame: { width: number; height: number },
    source: SourceVideoProperties,
    signal: AbortSignal
  ): Promise<WrittenMasks> {
    log.debug(`Job ${jobId}: rasterizing ${plan.runs.length} masks at ${frame.width}x${frame.height}`);
    const rasterOptions = {
      ...(request.antialias === undefined ? {} : { antialias: request.antialias }),
      ...(request.resolveAiMask ? { resolveAiMask: request.resolveAiMask } : {}),
      sourceSize: { width: source.width, height: source.height },
    };
    const session = await this.options.masks.open(jobId, frame, source.frameRate);
    try {
      // each bitmap is written and dropped inside its own task
      await runWithConcurrency(
        plan.runs,
        this.options.maskWorkers,
        async (run, index) => {
          const mask = rasterizeMask(run.geometry, frame.width, frame.height, rasterOptions);
          await session.writeRun(index, { mask, frameCount: run.frameCount });
        },
        signal
      );
      if (signal.aborted) throw new CropExportError('cancelled');
      return await session.finish(plan.runs.length);
    } catch (error) {
      await session.discard();
      throw error;
    }
  }

  private settleCancelled(job: QueuedJob): void {
    const cancelled = this.options.jobs.cancelJob(job.jobId);
    if (cancelled) job.resolve({ status: 'cancelled', job: cancelled });
  }
}

function settingsSummary(settings: ExportSettings): string {
  return [
    settings.codecHint,
    settings.enableAlpha ? 'alpha' : 'opaque',
    settings.preserveFullFrame ? 'full-frame' : 'cropped',
    settings.useHardwareEncoder ? (settings.hardwareBackend ?? 'hardware') : 'software',
  ].join('/');
}
