/**
 * Pure operations on crop timelines.
 * Every operation returns a new timeline and leaves its input untouched.
 */

import { randomUUID } from 'crypto';
import { CropExportError } from '@/lib/errors';
import type { CropGeometry, CropKeyframe, CropMode, CropTimeline, EasingType } from '@/types/crop';
import { assertValidGeometry, normalizeGeometry } from './geometry';

export interface NewKeyframe {
  timestamp: number;
  geometry: CropGeometry;
  easing?: EasingType;
  id?: string;
}

export interface TimelineLimits {
  /** Video duration in seconds; keyframes past it are rejected */
  durationSeconds?: number;
}

export function createTimeline(mode: CropMode): CropTimeline {
  return { mode, keyframes: [] };
}

function assertValidTimestamp(timestamp: number, limits: TimelineLimits): void {
  if (!Number.isFinite(timestamp) || timestamp < 0) {
    throw new CropExportError('invalid-keyframe', `Keyframe timestamp ${timestamp} is out of range`);
  }
  if (limits.durationSeconds !== undefined && timestamp > limits.durationSeconds) {
    throw new CropExportError(
      'invalid-keyframe',
      `Keyframe timestamp ${timestamp} is past the video duration ${limits.durationSeconds}`
    );
  }
}

function prepareGeometry(timeline: CropTimeline, geometry: CropGeometry): CropGeometry {
  if (geometry.mode !== timeline.mode) {
    throw new CropExportError(
      'invalid-geometry',
      `Cannot add ${geometry.mode} geometry to a ${timeline.mode} timeline`
    );
  }
  assertValidGeometry(geometry);
  return normalizeGeometry(geometry);
}

function sortKeyframes(keyframes: CropKeyframe[]): CropKeyframe[] {
  return [...keyframes].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Insert a keyframe. A keyframe already at the same timestamp is an error,
 * not a merge.
 */
export function addKeyframe(
  timeline: CropTimeline,
  keyframe: NewKeyframe,
  limits: TimelineLimits = {}
): CropTimeline {
  assertValidTimestamp(keyframe.timestamp, limits);
  if (timeline.keyframes.some((k) => k.timestamp === keyframe.timestamp)) {
    throw new CropExportError(
      'invalid-keyframe',
      `A keyframe already exists at ${keyframe.timestamp}s`
    );
  }

  const created: CropKeyframe = {
    id: keyframe.id ?? randomUUID(),
    timestamp: keyframe.timestamp,
    geometry: prepareGeometry(timeline, keyframe.geometry),
    easing: keyframe.easing ?? 'linear',
  };

  return { ...timeline, keyframes: sortKeyframes([...timeline.keyframes, created]) };
}

export type KeyframeUpdate = Partial<Pick<CropKeyframe, 'timestamp' | 'geometry' | 'easing'>>;

export function updateKeyframe(
  timeline: CropTimeline,
  keyframeId: string,
  updates: KeyframeUpdate,
  limits: TimelineLimits = {}
): CropTimeline {
  const existing = timeline.keyframes.find((k) => k.id === keyframeId);
  if (!existing) {
    throw new CropExportError('invalid-keyframe', `Keyframe ${keyframeId} does not exist`);
  }

  const updated: CropKeyframe = { ...existing };
  if (updates.timestamp !== undefined) {
    assertValidTimestamp(updates.timestamp, limits);
    const clash = timeline.keyframes.some(
      (k) => k.id !== keyframeId && k.timestamp === updates.timestamp
    );
    if (clash) {
      throw new CropExportError(
        'invalid-keyframe',
        `A keyframe already exists at ${updates.timestamp}s`
      );
    }
    updated.timestamp = updates.timestamp;
  }
  if (updates.geometry !== undefined) {
    updated.geometry = prepareGeometry(timeline, updates.geometry);
  }
  if (updates.easing !== undefined) {
    updated.easing = updates.easing;
  }

  return {
    ...timeline,
    keyframes: sortKeyframes(timeline.keyframes.map((k) => (k.id === keyframeId ? updated : k))),
  };
}

export function removeKeyframe(timeline: CropTimeline, keyframeId: string): CropTimeline {
  if (!timeline.keyframes.some((k) => k.id === keyframeId)) {
    throw new CropExportError('invalid-keyframe', `Keyframe ${keyframeId} does not exist`);
  }
  return { ...timeline, keyframes: timeline.keyframes.filter((k) => k.id !== keyframeId) };
}

/**
 * Switch the timeline's crop mode. Keyframes of the old mode cannot be
 * carried over, so they are cleared.
 */
export function setTimelineMode(timeline: CropTimeline, mode: CropMode): CropTimeline {
  if (timeline.mode === mode) return timeline;
  return createTimeline(mode);
}

/**
 * Check the structural invariants of a timeline built elsewhere
 * (parsed from storage or received over the wire).
 */
export function assertValidTimeline(timeline: CropTimeline, limits: TimelineLimits = {}): void {
  let previous = -Infinity;
  for (const keyframe of timeline.keyframes) {
    assertValidTimestamp(keyframe.timestamp, limits);
    if (keyframe.timestamp <= previous) {
      throw new CropExportError(
        'invalid-keyframe',
        'Keyframes must be sorted by timestamp with no duplicates'
      );
    }
    previous = keyframe.timestamp;
    if (keyframe.geometry.mode !== timeline.mode) {
      throw new CropExportError(
        'invalid-geometry',
        `Keyframe ${keyframe.id} has ${keyframe.geometry.mode} geometry in a ${timeline.mode} timeline`
      );
    }
    assertValidGeometry(keyframe.geometry);
  }
}
