import path from 'path';
import type { Server } from 'http';
import { config } from '../src/lib/config.js';
import { createLogger } from '../src/lib/logger.js';
import { createCropTimelineStore } from '../src/features/keyframes/stores/crop-timeline-store.js';
import { createApp } from './app.js';
import { JobManager } from './services/job-manager.js';
import { ExportOrchestrator } from './services/export-orchestrator.js';
import { FfprobeService } from './services/ffprobe-service.js';
import { FfmpegEncoder } from './services/ffmpeg-encoder.js';
import { FileMaskStore } from './services/mask-store.js';

const log = createLogger('Server');

const jobs = new JobManager();
const orchestrator = new ExportOrchestrator({
  jobs,
  prober: new FfprobeService(config.ffmpeg.ffprobePath),
  encoder: new FfmpegEncoder(config.ffmpeg.ffmpegPath),
  masks: new FileMaskStore(path.join(config.export.maskTempDir, 'cropframe')),
  concurrency: config.export.concurrency,
  maskWorkers: config.export.maskWorkers,
  keepMasks: config.export.keepMasks,
});
const store = createCropTimelineStore();

const app = createApp({
  orchestrator,
  jobs,
  store,
  corsOrigins: config.server.corsOrigins,
  environment: config.env,
  defaultHardwareBackend: config.ffmpeg.hardwareBackend,
});

log.info(`Environment: ${config.env}`);
log.info(`CORS origins: ${config.server.corsOrigins.join(', ')}`);
log.info(
  `Exports: ${config.export.concurrency} concurrent, ${config.export.maskWorkers} mask workers, ` +
    `hardware backend ${config.ffmpeg.hardwareBackend}`
);

let server: Server | undefined;

function startServer(): void {
  jobs.startCleanup();
  const { port, host } = config.server;
  server = app.listen(port, host, () => {
    log.info(`Running on http://${host}:${port}`);
    log.info(`Health check: http://${host}:${port}/health`);
  });
  server.on('error', (error) => {
    log.error('Failed to start:', error);
    process.exit(1);
  });
}

// Handle graceful shutdown
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`${signal} received, shutting down gracefully...`);
  jobs.stopCleanup();
  await orchestrator.shutdown();
  server?.close(() => {
    log.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  log.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled Rejection:', reason);
});

startServer();
