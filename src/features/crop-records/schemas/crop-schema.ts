/**
 * Zod Validation Schemas for Crop Records
 *
 * One record per video: crop mode, keyframes and export settings.
 * Used by storage and by the HTTP export API.
 */

import { z } from 'zod';
import { CropExportError } from '@/lib/errors';
import type { CropTimeline } from '@/types/crop';
import { HARDWARE_BACKENDS, type ExportSettings } from '@/types/export';
import { assertValidTimeline } from '@/features/keyframes/utils/timeline-operations';

export const CROP_RECORD_VERSION = 1;

/** Rounding slack for x + width <= 1 */
const EDGE_TOLERANCE = 1e-9;

// ============================================================================
// Geometry Schemas
// ============================================================================

const unit = z.number().finite().min(0).max(1);

const pointSchema = z.object({ x: unit, y: unit });

/** Bezier handles are offsets and may point outside the frame */
const handleSchema = z.object({
  x: z.number().finite().min(-1).max(1),
  y: z.number().finite().min(-1).max(1),
});

export const rectSchema = z
  .object({
    x: unit,
    y: unit,
    width: unit.refine((value) => value > 0, 'width must be positive'),
    height: unit.refine((value) => value > 0, 'height must be positive'),
  })
  .refine((rect) => rect.x + rect.width <= 1 + EDGE_TOLERANCE, 'rect extends past the right edge')
  .refine((rect) => rect.y + rect.height <= 1 + EDGE_TOLERANCE, 'rect extends past the bottom edge');

const maskVertexSchema = z.object({
  position: pointSchema,
  controlIn: handleSchema.optional(),
  controlOut: handleSchema.optional(),
});

export const geometrySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('rectangle'), rect: rectSchema }),
  z.object({
    mode: z.literal('circle'),
    center: pointSchema,
    radius: unit.refine((value) => value > 0, 'radius must be positive'),
  }),
  z.object({ mode: z.literal('freehand'), vertices: z.array(maskVertexSchema) }),
  z.object({ mode: z.literal('ai'), boundingBox: rectSchema, maskRef: z.string().min(1) }),
]);

// ============================================================================
// Timeline Schemas
// ============================================================================

export const cropModeSchema = z.enum(['rectangle', 'circle', 'freehand', 'ai']);

export const easingSchema = z.enum(['linear', 'ease-in', 'ease-out', 'ease-in-out', 'hold']);

const cropKeyframeSchema = z.object({
  id: z.string().min(1),
  timestamp: z.number().finite().min(0),
  easing: easingSchema,
  geometry: geometrySchema,
});

export const cropTimelineSchema = z.object({
  mode: cropModeSchema,
  keyframes: z.array(cropKeyframeSchema),
});

// ============================================================================
// Export Settings Schema
// ============================================================================

export const exportSettingsSchema = z.object({
  preserveFullFrame: z.boolean(),
  enableAlpha: z.boolean(),
  codecHint: z.enum(['source', 'h264', 'hevc', 'prores', 'vp9', 'av1']),
  useHardwareEncoder: z.boolean(),
  hardwareBackend: z.enum(HARDWARE_BACKENDS).optional(),
  backgroundColor: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, 'backgroundColor must be #rrggbb')
    .optional(),
});

// ============================================================================
// Record Schema
// ============================================================================

const cropRecordSchema = z.object({
  version: z.literal(CROP_RECORD_VERSION),
  videoId: z.string().min(1),
  mode: cropModeSchema,
  keyframes: z.array(cropKeyframeSchema),
  settings: exportSettingsSchema,
});

export type CropRecord = z.infer<typeof cropRecordSchema>;

export interface ParsedCropRecord {
  videoId: string;
  timeline: CropTimeline;
  settings: ExportSettings;
}

/**
 * Format Zod errors into human-readable messages
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? `${path}: ` : ''}${issue.message}`;
  });
}

/**
 * Geometry problems surface as `invalid-geometry`, anything else as
 * `invalid-input`.
 */
export function toValidationError(errors: z.ZodError, context: string): CropExportError {
  const geometryIssue = errors.issues.some((issue) => issue.path.includes('geometry'));
  return new CropExportError(
    geometryIssue ? 'invalid-geometry' : 'invalid-input',
    `Invalid ${context}: ${formatValidationErrors(errors).join('; ')}`
  );
}

export function toCropRecord(videoId: string, timeline: CropTimeline, settings: ExportSettings): CropRecord {
  return {
    version: CROP_RECORD_VERSION,
    videoId,
    mode: timeline.mode,
    keyframes: timeline.keyframes.map((keyframe) => ({
      id: keyframe.id,
      timestamp: keyframe.timestamp,
      easing: keyframe.easing,
      geometry: keyframe.geometry,
    })),
    settings,
  };
}

export function serializeCropRecord(
  videoId: string,
  timeline: CropTimeline,
  settings: ExportSettings
): string {
  return JSON.stringify(toCropRecord(videoId, timeline, settings));
}

/**
 * Parse a stored record (JSON text or an already-decoded object).
 * Keyframes must be sorted, unique by timestamp and match the record mode.
 */
export function parseCropRecord(input: unknown): ParsedCropRecord {
  let data: unknown = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (error) {
      throw new CropExportError('invalid-input', 'Crop record is not valid JSON', { cause: error });
    }
  }

  const result = cropRecordSchema.safeParse(data);
  if (!result.success) {
    throw toValidationError(result.error, 'crop record');
  }

  const { videoId, mode, keyframes, settings } = result.data;
  const timeline: CropTimeline = { mode, keyframes };
  assertValidTimeline(timeline);
  return { videoId, timeline, settings };
}
