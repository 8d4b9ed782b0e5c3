import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { createLogger } from '../../src/lib/logger.js';
import { CropExportError } from '../../src/lib/errors.js';
import { DEFAULT_EXPORT_SETTINGS, type ExportSettings, type HardwareBackend } from '../../src/types/export.js';
import type { CropTimeline } from '../../src/types/crop.js';
import {
  cropTimelineSchema,
  exportSettingsSchema,
  rectSchema,
  toValidationError,
} from '../../src/features/crop-records/schemas/crop-schema.js';
import { buildAiTimeline } from '../../src/features/masks/utils/ai-timeline.js';
import type { CropTimelineStoreApi } from '../../src/features/keyframes/stores/crop-timeline-store.js';
import type { ExportJob, ExportRequest } from '../types.js';
import { isTerminalStatus } from '../types.js';
import type { JobManager } from '../services/job-manager.js';
import type { ExportOrchestrator } from '../services/export-orchestrator.js';
import { sendError, sendNotFound } from './respond.js';

const log = createLogger('API');

const trackedFrameSchema = z.object({
  timestamp: z.number().finite().min(0),
  boundingBox: rectSchema,
  mask: z.object({
    size: z.tuple([z.number().int().positive(), z.number().int().positive()]),
    counts: z.union([z.array(z.number().int().min(0)), z.string()]),
  }),
});

const sourceSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  frameRate: z.number().positive(),
  codec: z.string().min(1),
  durationSeconds: z.number().positive().optional(),
  bitRate: z.number().positive().optional(),
  bitDepth: z.number().int().positive().optional(),
  color: z
    .object({
      primaries: z.string().optional(),
      transfer: z.string().optional(),
      matrix: z.string().optional(),
    })
    .optional(),
});

export const exportBodySchema = z.object({
  jobId: z.string().min(1).optional(),
  sourcePath: z.string().min(1),
  outputPath: z.string().min(1),
  /** Use the crop stored for this video */
  videoId: z.string().min(1).optional(),
  timeline: cropTimelineSchema.optional(),
  /** Object-tracker output; replaces any timeline with an AI one */
  aiFrames: z.array(trackedFrameSchema).min(1).optional(),
  settings: exportSettingsSchema.partial().optional(),
  source: sourceSchema.optional(),
  antialias: z.boolean().optional(),
});

export type ExportBody = z.infer<typeof exportBodySchema>;

export interface ExportRouterDeps {
  orchestrator: ExportOrchestrator;
  jobs: JobManager;
  store: CropTimelineStoreApi;
  /** Backend used when a hardware export names none */
  defaultHardwareBackend?: HardwareBackend;
}

/**
 * Turn a validated request body into an orchestrator request, pulling the
 * timeline from the body, the tracker frames or the crop store.
 */
export function resolveExportRequest(
  body: ExportBody,
  store: CropTimelineStoreApi,
  defaultHardwareBackend?: HardwareBackend
): ExportRequest {
  const entry = body.videoId ? store.getState().getEntry(body.videoId) : undefined;
  if (body.videoId && !entry) {
    throw new CropExportError('invalid-input', `No crop stored for video ${body.videoId}`);
  }

  const settings: ExportSettings = {
    ...(entry?.settings ?? DEFAULT_EXPORT_SETTINGS),
    ...body.settings,
  };
  if (settings.useHardwareEncoder && !settings.hardwareBackend && defaultHardwareBackend) {
    settings.hardwareBackend = defaultHardwareBackend;
  }

  let timeline: CropTimeline | undefined = body.timeline ?? entry?.timeline;
  let resolveAiMask: ExportRequest['resolveAiMask'];
  if (body.aiFrames) {
    const built = buildAiTimeline(body.aiFrames);
    timeline = built.timeline;
    resolveAiMask = built.library.resolve;
  }
  if (!timeline) {
    throw new CropExportError('invalid-input', 'Provide a timeline, aiFrames or a stored videoId');
  }

  return {
    sourcePath: body.sourcePath,
    outputPath: body.outputPath,
    timeline,
    settings,
    ...(body.jobId ? { jobId: body.jobId } : {}),
    ...(body.source ? { source: body.source } : {}),
    ...(resolveAiMask ? { resolveAiMask } : {}),
    ...(body.antialias === undefined ? {} : { antialias: body.antialias }),
  };
}

export function toJobResponse(job: ExportJob) {
  return {
    jobId: job.jobId,
    status: job.status,
    progress: job.progress,
    sourcePath: job.sourcePath,
    outputPath: job.outputPath,
    maskCount: job.maskCount,
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function createExportRouter({ orchestrator, jobs, store, defaultHardwareBackend }: ExportRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/exports
   * Queue an export job
   */
  router.post('/exports', (req: Request, res: Response) => {
    const parsed = exportBodySchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, toValidationError(parsed.error, 'export request'), 'POST /exports');
      return;
    }

    try {
      const request = resolveExportRequest(parsed.data, store, defaultHardwareBackend);
      const handle = orchestrator.enqueue(request);
      const job = jobs.getJob(handle.jobId);
      log.info(`Queued export ${handle.jobId}: ${request.sourcePath} -> ${request.outputPath}`);
      res.status(202).json({
        success: true,
        jobId: handle.jobId,
        status: job?.status ?? 'idle',
      });
    } catch (error) {
      sendError(res, error, 'POST /exports');
    }
  });

  /**
   * GET /api/exports
   * List known jobs
   */
  router.get('/exports', (_req: Request, res: Response) => {
    res.json({ success: true, jobs: jobs.getAllJobs().map(toJobResponse) });
  });

  /**
   * GET /api/exports/:jobId
   * Status of one job
   */
  router.get('/exports/:jobId', (req: Request, res: Response) => {
    const job = jobs.getJob(req.params.jobId ?? '');
    if (!job) {
      sendNotFound(res, 'Job');
      return;
    }
    res.json({ success: true, job: toJobResponse(job) });
  });

  /**
   * DELETE /api/exports/:jobId
   * Cancel a job
   */
  router.delete('/exports/:jobId', (req: Request, res: Response) => {
    const jobId = req.params.jobId ?? '';
    const job = jobs.getJob(jobId);
    if (!job) {
      sendNotFound(res, 'Job');
      return;
    }

    const cancelled = orchestrator.cancel(jobId);
    res.json({
      success: true,
      cancelled,
      status: jobs.getJob(jobId)?.status ?? job.status,
    });
  });

  /**
   * GET /api/exports/:jobId/events
   * Server-sent job updates; the stream ends when the job does
   */
  router.get('/exports/:jobId/events', (req: Request, res: Response) => {
    const jobId = req.params.jobId ?? '';
    const job = jobs.getJob(jobId);
    if (!job) {
      sendNotFound(res, 'Job');
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    const send = (update: ExportJob): void => {
      res.write(`data: ${JSON.stringify(toJobResponse(update))}\n\n`);
    };

    send(job);
    if (isTerminalStatus(job.status)) {
      res.end();
      return;
    }

    const unsubscribe = jobs.subscribe(jobId, (update) => {
      send(update);
      if (isTerminalStatus(update.status)) {
        unsubscribe();
        res.end();
      }
    });
    req.on('close', unsubscribe);
  });

  return router;
}
