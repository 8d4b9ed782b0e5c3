/**
 * Error kinds raised by the crop/export engine.
 *
 * Validation and build-time kinds abort a job before any encoder process
 * starts. `encoder-process-failure` and `cancelled` arrive through the
 * same completion channel as a successful export.
 */
export type CropExportErrorType =
  | 'no-keyframes'
  | 'invalid-geometry'
  | 'invalid-keyframe'
  | 'invalid-input'
  | 'mask-resolution-mismatch'
  | 'odd-dimension'
  | 'unsupported-codec'
  | 'encoder-process-failure'
  | 'cancelled';

export interface CropExportErrorDetails {
  exitCode?: number | null;
  /** Tail of the encoder's diagnostic output */
  diagnostics?: string;
  expected?: { width: number; height: number };
  actual?: { width: number; height: number };
  codec?: string;
  cause?: unknown;
}

/** Longest encoder stderr excerpt kept on a failure */
export const MAX_DIAGNOSTICS_LENGTH = 500;

const DEFAULT_MESSAGES: Record<CropExportErrorType, string> = {
  'no-keyframes': 'Crop timeline has no keyframes',
  'invalid-geometry': 'Crop geometry is invalid',
  'invalid-keyframe': 'Keyframe cannot be inserted',
  'invalid-input': 'Export input is invalid',
  'mask-resolution-mismatch': 'Mask resolution does not match the target frame',
  'odd-dimension': 'Frame dimension cannot be made even',
  'unsupported-codec': 'Codec is not supported for this export',
  'encoder-process-failure': 'Encoder process failed',
  'cancelled': 'Export cancelled',
};

export class CropExportError extends Error {
  constructor(
    public readonly type: CropExportErrorType,
    message?: string,
    public readonly details: CropExportErrorDetails = {}
  ) {
    super(message ?? DEFAULT_MESSAGES[type]);
    this.name = 'CropExportError';
  }
}

export function isCropExportError(
  value: unknown,
  type?: CropExportErrorType
): value is CropExportError {
  return value instanceof CropExportError && (type === undefined || value.type === type);
}

/**
 * Keep only the last MAX_DIAGNOSTICS_LENGTH characters of encoder output.
 */
export function excerptDiagnostics(output: string): string {
  const trimmed = output.trimEnd();
  return trimmed.length > MAX_DIAGNOSTICS_LENGTH
    ? trimmed.slice(trimmed.length - MAX_DIAGNOSTICS_LENGTH)
    : trimmed;
}

/**
 * Wrap anything thrown into a CropExportError, keeping ones that already are.
 */
export function toCropExportError(
  error: unknown,
  fallback: CropExportErrorType = 'invalid-input'
): CropExportError {
  if (error instanceof CropExportError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CropExportError(fallback, message, { cause: error });
}
