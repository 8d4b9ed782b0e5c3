import type { Response } from 'express';
import { createLogger } from '../../src/lib/logger.js';
import { isCropExportError, type CropExportErrorType } from '../../src/lib/errors.js';

const log = createLogger('API');

const STATUS_BY_TYPE: Record<CropExportErrorType, number> = {
  'no-keyframes': 400,
  'invalid-geometry': 400,
  'invalid-keyframe': 400,
  'invalid-input': 400,
  'mask-resolution-mismatch': 400,
  'odd-dimension': 400,
  'unsupported-codec': 400,
  'encoder-process-failure': 500,
  'cancelled': 409,
};

export function statusForError(error: unknown): number {
  return isCropExportError(error) ? STATUS_BY_TYPE[error.type] : 500;
}

/**
 * Reply with `{ success: false, error, type }`.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  const status = statusForError(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status >= 500) {
    log.error(`Error in ${context}:`, error);
  } else {
    log.debug(`Rejected ${context}: ${message}`);
  }
  res.status(status).json({
    success: false,
    error: message,
    type: isCropExportError(error) ? error.type : 'internal',
  });
}

export function sendNotFound(res: Response, what: string): void {
  res.status(404).json({ success: false, error: `${what} not found`, type: 'not-found' });
}
