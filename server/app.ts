import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { CropExportError } from '../src/lib/errors.js';
import type { HardwareBackend } from '../src/types/export.js';
import type { CropTimelineStoreApi } from '../src/features/keyframes/stores/crop-timeline-store.js';
import { createExportRouter } from './routes/export.js';
import { createCropRouter } from './routes/crops.js';
import { sendError } from './routes/respond.js';
import type { JobManager } from './services/job-manager.js';
import type { ExportOrchestrator } from './services/export-orchestrator.js';

export interface AppDeps {
  orchestrator: ExportOrchestrator;
  jobs: JobManager;
  store: CropTimelineStoreApi;
  corsOrigins: string[];
  environment?: string;
  defaultHardwareBackend?: HardwareBackend;
}

export function createApp({
  orchestrator,
  jobs,
  store,
  corsOrigins,
  environment = 'development',
  defaultHardwareBackend,
}: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: corsOrigins.length === 1 ? corsOrigins[0] : corsOrigins,
    credentials: true,
  }));
  app.use(express.json({ limit: '50mb' }));

  // Health check with queue status
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
      queuedJobs: orchestrator.queuedCount,
      runningJobs: orchestrator.runningCount,
      uptime: process.uptime(),
    });
  });

  // API routes
  app.use('/api', createExportRouter({
    orchestrator,
    jobs,
    store,
    ...(defaultHardwareBackend ? { defaultHardwareBackend } : {}),
  }));
  app.use('/api', createCropRouter(store));

  // Malformed JSON bodies and anything a route let through
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const bodyError = error instanceof SyntaxError && 'body' in error;
    sendError(
      res,
      bodyError ? new CropExportError('invalid-input', 'Request body is not valid JSON') : error,
      'request'
    );
  });

  return app;
}
