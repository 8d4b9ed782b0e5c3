import type { CropExportErrorType } from '../src/lib/errors.js';
import type { CropTimeline } from '../src/types/crop.js';
import type { ExportSettings, RenderedMask, SourceVideoProperties } from '../src/types/export.js';

/**
 * Export job lifecycle. Queued jobs sit in `idle`; `mask-preparation` is
 * skipped when the export composites no mask.
 */
export type ExportJobStatus =
  | 'idle'
  | 'validating'
  | 'mask-preparation'
  | 'graph-building'
  | 'encoding'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<ExportJobStatus> = new Set([
  'completed',
  'failed',
  'cancelled',
]);

export function isTerminalStatus(status: ExportJobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface ExportJobError {
  type: CropExportErrorType;
  message: string;
  exitCode?: number | null;
  diagnostics?: string;
}

export interface ExportJob {
  jobId: string;
  status: ExportJobStatus;
  /** Encoding progress in [0, 1], never decreasing */
  progress: number;
  sourcePath: string;
  outputPath: string;
  /** Number of mask files written for this job */
  maskCount?: number;
  error?: ExportJobError;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface ExportRequest {
  jobId?: string;
  sourcePath: string;
  outputPath: string;
  timeline: CropTimeline;
  settings: ExportSettings;
  /** Skip probing when the caller already knows the source */
  source?: SourceVideoProperties;
  /** Tracker masks for AI timelines */
  resolveAiMask?: (maskRef: string) => RenderedMask | undefined;
  antialias?: boolean;
}

/** Terminal outcome delivered on the job's completion channel */
export type ExportOutcome =
  | { status: 'completed'; job: ExportJob }
  | { status: 'failed'; job: ExportJob; error: ExportJobError }
  | { status: 'cancelled'; job: ExportJob };

export interface ExportJobHandle {
  jobId: string;
  done: Promise<ExportOutcome>;
}
