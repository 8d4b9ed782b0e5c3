/**
 * Keyframe interpolation utilities.
 * Computes the crop geometry of a timeline at any time.
 */

import { CropExportError } from '@/lib/errors';
import type {
  CropGeometry,
  CropKeyframe,
  CropTimeline,
  MaskVertex,
  NormalizedPoint,
  NormalizedRect,
} from '@/types/crop';
import { applyEasing } from './easing';

function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

function lerpPoint(from: NormalizedPoint, to: NormalizedPoint, t: number): NormalizedPoint {
  return { x: lerp(from.x, to.x, t), y: lerp(from.y, to.y, t) };
}

function lerpRect(from: NormalizedRect, to: NormalizedRect, t: number): NormalizedRect {
  return {
    x: lerp(from.x, to.x, t),
    y: lerp(from.y, to.y, t),
    width: lerp(from.width, to.width, t),
    height: lerp(from.height, to.height, t),
  };
}

function lerpHandle(
  from: NormalizedPoint | undefined,
  to: NormalizedPoint | undefined,
  t: number
): NormalizedPoint | undefined {
  if (from && to) return lerpPoint(from, to, t);
  return from ? { ...from } : undefined;
}

function lerpVertex(from: MaskVertex, to: MaskVertex, t: number): MaskVertex {
  const vertex: MaskVertex = { position: lerpPoint(from.position, to.position, t) };
  const controlIn = lerpHandle(from.controlIn, to.controlIn, t);
  const controlOut = lerpHandle(from.controlOut, to.controlOut, t);
  if (controlIn) vertex.controlIn = controlIn;
  if (controlOut) vertex.controlOut = controlOut;
  return vertex;
}

/**
 * Field-wise interpolation between two geometries of the same mode.
 * Freehand polygons with different vertex counts hold the earlier polygon;
 * AI geometry is never interpolated.
 */
export function interpolateGeometry(from: CropGeometry, to: CropGeometry, t: number): CropGeometry {
  switch (from.mode) {
    case 'rectangle':
      if (to.mode !== 'rectangle') return from;
      return { mode: 'rectangle', rect: lerpRect(from.rect, to.rect, t) };
    case 'circle':
      if (to.mode !== 'circle') return from;
      return {
        mode: 'circle',
        center: lerpPoint(from.center, to.center, t),
        radius: lerp(from.radius, to.radius, t),
      };
    case 'freehand': {
      if (to.mode !== 'freehand' || to.vertices.length !== from.vertices.length) return from;
      return {
        mode: 'freehand',
        vertices: from.vertices.map((vertex, i) => {
          const target = to.vertices[i];
          return target ? lerpVertex(vertex, target, t) : vertex;
        }),
      };
    }
    case 'ai':
      return from;
  }
}

/**
 * Interpolate between two bracketing keyframes.
 * Uses the easing of the "from" keyframe.
 */
function interpolateBetweenKeyframes(prev: CropKeyframe, next: CropKeyframe, time: number): CropGeometry {
  const range = next.timestamp - prev.timestamp;
  if (range <= 0) return prev.geometry;

  const progress = (time - prev.timestamp) / range;
  const eased = applyEasing(progress, prev.easing);
  return interpolateGeometry(prev.geometry, next.geometry, eased);
}

/**
 * Index of the last keyframe whose timestamp is <= time, or -1 when time
 * precedes every keyframe. Keyframes are sorted by timestamp.
 */
export function findKeyframeIndexAtOrBefore(keyframes: CropKeyframe[], time: number): number {
  let low = 0;
  let high = keyframes.length - 1;
  let found = -1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const keyframe = keyframes[mid];
    if (keyframe && keyframe.timestamp <= time) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return found;
}

/**
 * Get the crop geometry of a timeline at a given time (seconds).
 *
 * - no keyframes: throws `no-keyframes`
 * - one keyframe: that geometry for every time
 * - before the first / at or after the last keyframe: clamped
 * - AI timelines: the keyframe at or before `time`, no blending
 */
export function sampleTimeline(timeline: CropTimeline, time: number): CropGeometry {
  const { keyframes } = timeline;
  const first = keyframes[0];
  if (!first) {
    throw new CropExportError('no-keyframes');
  }

  // Single keyframe - constant geometry
  if (keyframes.length === 1) return first.geometry;

  // Before first keyframe - hold first geometry
  if (time <= first.timestamp) return first.geometry;

  // At or after last keyframe - hold last geometry
  const last = keyframes[keyframes.length - 1];
  if (!last || time >= last.timestamp) return (last ?? first).geometry;

  const index = findKeyframeIndexAtOrBefore(keyframes, time);
  const prev = keyframes[index];
  const next = keyframes[index + 1];
  if (!prev || !next) return last.geometry;

  if (timeline.mode === 'ai') return prev.geometry;
  return interpolateBetweenKeyframes(prev, next, time);
}
