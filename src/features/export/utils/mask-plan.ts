/**
 * Decides between no mask, one still mask and a mask sequence by sampling
 * the timeline at every output frame.
 */

import type { CropGeometry, CropTimeline, NormalizedRect } from '@/types/crop';
import type { TimelineSummary } from '@/types/export';
import {
  geometriesEqual,
  geometryBounds,
  isDegenerateGeometry,
  unionRects,
} from '@/features/keyframes/utils/geometry';
import { sampleTimeline } from '@/features/keyframes/utils/interpolation';

export interface PlanSource {
  /** Even frame size the masks are rasterized at */
  width: number;
  height: number;
  frameRate: number;
  durationSeconds?: number;
}

/** Consecutive output frames sharing one geometry */
export interface GeometryRun {
  geometry: CropGeometry;
  startFrame: number;
  frameCount: number;
}

export interface MaskPlan {
  summary: TimelineSummary;
  frameCount: number;
  runs: GeometryRun[];
}

/**
 * Number of frames the masks are planned for. Without a known duration
 * the plan runs up to and including the frame of the last keyframe; the
 * encoder holds the final mask until the source ends.
 */
export function outputFrameCount(timeline: CropTimeline, source: PlanSource): number {
  if (source.durationSeconds !== undefined) {
    return Math.max(1, Math.round(source.durationSeconds * source.frameRate));
  }
  const lastKeyframe = timeline.keyframes[timeline.keyframes.length - 1];
  return Math.round((lastKeyframe?.timestamp ?? 0) * source.frameRate) + 1;
}

export function frameTime(frame: number, frameRate: number): number {
  return frame / frameRate;
}

/**
 * Sample the timeline at every output frame and collapse equal neighbours.
 */
export function collectGeometryRuns(timeline: CropTimeline, source: PlanSource): GeometryRun[] {
  const runs: GeometryRun[] = [];
  const frames = outputFrameCount(timeline, source);
  let current: GeometryRun | undefined;
  for (let frame = 0; frame < frames; frame++) {
    const geometry = sampleTimeline(timeline, frameTime(frame, source.frameRate));
    if (current && geometriesEqual(current.geometry, geometry)) {
      current.frameCount++;
      continue;
    }
    current = { geometry, startFrame: frame, frameCount: 1 };
    runs.push(current);
  }
  return runs;
}

export function planMasks(timeline: CropTimeline, source: PlanSource): MaskPlan {
  const { mode } = timeline;
  const frameCount = outputFrameCount(timeline, source);
  if (timeline.keyframes.length === 0) {
    return { summary: { kind: 'none', mode }, frameCount, runs: [] };
  }

  const runs = collectGeometryRuns(timeline, source);
  if (runs.every((run) => isDegenerateGeometry(run.geometry))) {
    return { summary: { kind: 'none', mode }, frameCount, runs: [] };
  }

  const boundsOf = (geometry: CropGeometry): NormalizedRect =>
    geometryBounds(geometry, source.width, source.height);

  const first = runs[0];
  if (runs.length === 1 && first) {
    return {
      summary: { kind: 'static', mode, geometry: first.geometry, bounds: boundsOf(first.geometry) },
      frameCount,
      runs,
    };
  }

  const bounds = runs
    .map((run) => boundsOf(run.geometry))
    .reduce((union, rect) => unionRects(union, rect));
  return { summary: { kind: 'dynamic', mode, bounds }, frameCount, runs };
}
