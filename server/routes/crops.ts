import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { CropExportError } from '../../src/lib/errors.js';
import {
  cropModeSchema,
  easingSchema,
  geometrySchema,
  parseCropRecord,
  toCropRecord,
  toValidationError,
} from '../../src/features/crop-records/schemas/crop-schema.js';
import type { CropTimelineStoreApi, VideoCropEntry } from '../../src/features/keyframes/stores/crop-timeline-store.js';
import { sendError, sendNotFound } from './respond.js';

const newKeyframeSchema = z.object({
  timestamp: z.number().finite(),
  geometry: geometrySchema,
  easing: easingSchema.optional(),
});

const keyframeUpdateSchema = z.object({
  timestamp: z.number().finite().optional(),
  geometry: geometrySchema.optional(),
  easing: easingSchema.optional(),
});

const modeBodySchema = z.object({ mode: cropModeSchema });

function recordOf(entry: VideoCropEntry) {
  return toCropRecord(entry.videoId, entry.timeline, entry.settings);
}

/**
 * Crop records per video, backed by the timeline store.
 */
export function createCropRouter(store: CropTimelineStoreApi): Router {
  const router = Router();

  const requireEntry = (res: Response, videoId: string): VideoCropEntry | undefined => {
    const entry = store.getState().getEntry(videoId);
    if (!entry) sendNotFound(res, 'Crop');
    return entry;
  };

  /**
   * PUT /api/crops/:videoId
   * Store a crop record, replacing any existing one
   */
  router.put('/crops/:videoId', (req: Request, res: Response) => {
    const videoId = req.params.videoId ?? '';
    try {
      const parsed = parseCropRecord(req.body);
      if (parsed.videoId !== videoId) {
        throw new CropExportError('invalid-input', `Record is for ${parsed.videoId}, not ${videoId}`);
      }
      const previous = store.getState().getEntry(videoId);
      const entry = store.getState().loadVideo(videoId, {
        timeline: parsed.timeline,
        settings: parsed.settings,
        ...(previous?.durationSeconds === undefined ? {} : { durationSeconds: previous.durationSeconds }),
      });
      res.json({ success: true, record: recordOf(entry) });
    } catch (error) {
      sendError(res, error, 'PUT /crops');
    }
  });

  /**
   * GET /api/crops/:videoId
   */
  router.get('/crops/:videoId', (req: Request, res: Response) => {
    const entry = requireEntry(res, req.params.videoId ?? '');
    if (!entry) return;
    res.json({ success: true, record: recordOf(entry) });
  });

  /**
   * DELETE /api/crops/:videoId
   */
  router.delete('/crops/:videoId', (req: Request, res: Response) => {
    const removed = store.getState().unloadVideo(req.params.videoId ?? '');
    if (!removed) {
      sendNotFound(res, 'Crop');
      return;
    }
    res.json({ success: true, removed });
  });

  /**
   * PUT /api/crops/:videoId/mode
   * Switch crop mode; keyframes of the old mode are dropped
   */
  router.put('/crops/:videoId/mode', (req: Request, res: Response) => {
    const videoId = req.params.videoId ?? '';
    if (!requireEntry(res, videoId)) return;
    const parsed = modeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, toValidationError(parsed.error, 'mode'), 'PUT /crops/mode');
      return;
    }
    store.getState().setMode(videoId, parsed.data.mode);
    const entry = store.getState().getEntry(videoId);
    res.json({ success: true, record: entry ? recordOf(entry) : undefined });
  });

  /**
   * POST /api/crops/:videoId/keyframes
   */
  router.post('/crops/:videoId/keyframes', (req: Request, res: Response) => {
    const videoId = req.params.videoId ?? '';
    if (!requireEntry(res, videoId)) return;
    const parsed = newKeyframeSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, toValidationError(parsed.error, 'keyframe'), 'POST /crops/keyframes');
      return;
    }
    try {
      const keyframeId = store.getState().addKeyframe(videoId, parsed.data);
      res.status(201).json({ success: true, keyframeId });
    } catch (error) {
      sendError(res, error, 'POST /crops/keyframes');
    }
  });

  /**
   * PATCH /api/crops/:videoId/keyframes/:keyframeId
   */
  router.patch('/crops/:videoId/keyframes/:keyframeId', (req: Request, res: Response) => {
    const videoId = req.params.videoId ?? '';
    if (!requireEntry(res, videoId)) return;
    const parsed = keyframeUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, toValidationError(parsed.error, 'keyframe update'), 'PATCH /crops/keyframes');
      return;
    }
    try {
      store.getState().updateKeyframe(videoId, req.params.keyframeId ?? '', parsed.data);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'PATCH /crops/keyframes');
    }
  });

  /**
   * DELETE /api/crops/:videoId/keyframes/:keyframeId
   */
  router.delete('/crops/:videoId/keyframes/:keyframeId', (req: Request, res: Response) => {
    const videoId = req.params.videoId ?? '';
    if (!requireEntry(res, videoId)) return;
    try {
      store.getState().removeKeyframe(videoId, req.params.keyframeId ?? '');
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'DELETE /crops/keyframes');
    }
  });

  return router;
}
