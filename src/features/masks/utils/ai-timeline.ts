/**
 * Turns object-tracker output into an AI-mode crop timeline.
 */

import { CropExportError } from '@/lib/errors';
import type { CropKeyframe, CropTimeline, NormalizedRect } from '@/types/crop';
import type { RenderedMask } from '@/types/export';
import { aiGeometry } from '@/features/keyframes/utils/geometry';
import { assertValidTimeline } from '@/features/keyframes/utils/timeline-operations';
import { decodeCocoRle, type CocoRle } from './coco-rle';

export interface TrackedFrame {
  timestamp: number;
  boundingBox: NormalizedRect;
  /** Decoded bitmap or tracker RLE */
  mask: RenderedMask | CocoRle;
}

/**
 * Mask reference -> bitmap lookup for AI geometry.
 */
export class AiMaskLibrary {
  private masks = new Map<string, RenderedMask>();

  add(maskRef: string, mask: RenderedMask): void {
    this.masks.set(maskRef, mask);
  }

  get(maskRef: string): RenderedMask | undefined {
    return this.masks.get(maskRef);
  }

  has(maskRef: string): boolean {
    return this.masks.has(maskRef);
  }

  get size(): number {
    return this.masks.size;
  }

  /** Bound lookup suitable for `RasterizeOptions.resolveAiMask` */
  readonly resolve = (maskRef: string): RenderedMask | undefined => this.get(maskRef);
}

function isRenderedMask(mask: RenderedMask | CocoRle): mask is RenderedMask {
  return 'bytes' in mask;
}

/**
 * One hold keyframe per tracked frame, each pointing at its own mask.
 * Frames are sorted once; two frames at the same timestamp are rejected.
 */
export function buildAiTimeline(
  frames: TrackedFrame[],
  maskRefPrefix = 'ai'
): { timeline: CropTimeline; library: AiMaskLibrary } {
  const ordered = [...frames].sort((a, b) => a.timestamp - b.timestamp);
  const keyframes: CropKeyframe[] = [];
  let previous: TrackedFrame | undefined;
  for (const [index, frame] of ordered.entries()) {
    if (previous?.timestamp === frame.timestamp) {
      throw new CropExportError('invalid-keyframe', `A keyframe already exists at ${frame.timestamp}s`);
    }
    previous = frame;
    const maskRef = `${maskRefPrefix}-${index}`;
    keyframes.push({
      id: maskRef,
      timestamp: frame.timestamp,
      geometry: aiGeometry(frame.boundingBox, maskRef),
      easing: 'hold',
    });
  }

  const timeline: CropTimeline = { mode: 'ai', keyframes };
  assertValidTimeline(timeline);

  const library = new AiMaskLibrary();
  for (const [index, frame] of ordered.entries()) {
    library.add(`${maskRefPrefix}-${index}`, isRenderedMask(frame.mask) ? frame.mask : decodeCocoRle(frame.mask));
  }
  return { timeline, library };
}
