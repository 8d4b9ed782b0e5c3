/**
 * Mask rasterization for crop geometry.
 *
 * Produces a single-channel 8-bit mask (255 = visible) at a target pixel
 * size. Shapes are filled by horizontal spans sampled at pixel centers:
 * a pixel is inside when its center is, with half-open edges so that
 * neighbouring shapes never claim the same pixel twice. Polygons use the
 * even-odd rule.
 *
 * With `antialias` every pixel is sampled on a 4x4 grid and the mask holds
 * the covered fraction instead of 0/255.
 */

import { CropExportError } from '@/lib/errors';
import type {
  CircleGeometry,
  CropGeometry,
  FreehandGeometry,
  MaskVertex,
  NormalizedPoint,
  NormalizedRect,
} from '@/types/crop';
import type { RenderedMask } from '@/types/export';
import { circleRadiusPixels, isDegenerateGeometry } from '@/features/keyframes/utils/geometry';

export interface RasterizeOptions {
  antialias?: boolean;
  /** Looks up the tracker-supplied mask for an AI geometry */
  resolveAiMask?: (maskRef: string) => RenderedMask | undefined;
  /**
   * Untrimmed source size. AI masks of this size are cropped to the target
   * by dropping the trailing column and row.
   */
  sourceSize?: { width: number; height: number };
}

interface Point {
  x: number;
  y: number;
}

/** Sorted [start, end) x-intervals covered at one sample row */
type SpanSource = (y: number) => Array<[number, number]>;

const SUBSAMPLES = 4;
const OPAQUE = 255;

function assertTargetSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new CropExportError('invalid-input', `Invalid mask size ${width}x${height}`);
  }
}

/**
 * Pixels whose sample position u + 0.5 lies in [start, end)
 */
function sampleRange(start: number, end: number, limit: number): [number, number] {
  const first = Math.max(0, Math.ceil(start - 0.5));
  const last = Math.min(limit - 1, Math.ceil(end - 0.5) - 1);
  return [first, last];
}

function fillHard(spans: SpanSource, width: number, height: number): Uint8Array {
  const bytes = new Uint8Array(width * height);
  for (let py = 0; py < height; py++) {
    const rowOffset = py * width;
    for (const [start, end] of spans(py + 0.5)) {
      const [first, last] = sampleRange(start, end, width);
      if (last >= first) bytes.fill(OPAQUE, rowOffset + first, rowOffset + last + 1);
    }
  }
  return bytes;
}

function fillSupersampled(spans: SpanSource, width: number, height: number): Uint8Array {
  const coverage = new Uint16Array(width * height);
  const subWidth = width * SUBSAMPLES;
  for (let py = 0; py < height; py++) {
    const rowOffset = py * width;
    for (let sy = 0; sy < SUBSAMPLES; sy++) {
      const y = py + (sy + 0.5) / SUBSAMPLES;
      for (const [start, end] of spans(y)) {
        const [first, last] = sampleRange(start * SUBSAMPLES, end * SUBSAMPLES, subWidth);
        for (let s = first; s <= last; s++) {
          const index = rowOffset + Math.floor(s / SUBSAMPLES);
          coverage[index] = (coverage[index] ?? 0) + 1;
        }
      }
    }
  }
  const total = SUBSAMPLES * SUBSAMPLES;
  const bytes = new Uint8Array(width * height);
  for (let i = 0; i < coverage.length; i++) {
    bytes[i] = Math.round(((coverage[i] ?? 0) * OPAQUE) / total);
  }
  return bytes;
}

function rectSpans(rect: NormalizedRect, width: number, height: number): SpanSource {
  const left = rect.x * width;
  const right = (rect.x + rect.width) * width;
  const top = rect.y * height;
  const bottom = (rect.y + rect.height) * height;
  return (y) => (y >= top && y < bottom ? [[left, right]] : []);
}

function circleSpans(geometry: CircleGeometry, width: number, height: number): SpanSource {
  const cx = geometry.center.x * width;
  const cy = geometry.center.y * height;
  const r = circleRadiusPixels(geometry.radius, width, height);
  return (y) => {
    const dy = y - cy;
    const squared = r * r - dy * dy;
    if (squared <= 0) return [];
    const half = Math.sqrt(squared);
    return [[cx - half, cx + half]];
  };
}

function toPixels(point: NormalizedPoint, width: number, height: number): Point {
  return { x: point.x * width, y: point.y * height };
}

function offset(base: NormalizedPoint, handle: NormalizedPoint): NormalizedPoint {
  return { x: base.x + handle.x, y: base.y + handle.y };
}

function cubicAt(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const u = 1 - t;
  const a = u * u * u;
  const b = 3 * u * u * t;
  const c = 3 * u * t * t;
  const d = t * t * t;
  return {
    x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
    y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
  };
}

/**
 * Control points of the curve between two vertices, or null for a straight
 * edge. A lone handle describes a quadratic curve, raised to a cubic.
 */
function segmentControls(
  from: MaskVertex,
  to: MaskVertex,
  width: number,
  height: number
): [Point, Point] | null {
  const p0 = toPixels(from.position, width, height);
  const p3 = toPixels(to.position, width, height);
  const out = from.controlOut ? toPixels(offset(from.position, from.controlOut), width, height) : null;
  const into = to.controlIn ? toPixels(offset(to.position, to.controlIn), width, height) : null;

  if (out && into) return [out, into];
  const q = out ?? into;
  if (!q) return null;
  return [
    { x: p0.x + (2 / 3) * (q.x - p0.x), y: p0.y + (2 / 3) * (q.y - p0.y) },
    { x: p3.x + (2 / 3) * (q.x - p3.x), y: p3.y + (2 / 3) * (q.y - p3.y) },
  ];
}

/**
 * Flatten a closed freehand path into pixel-space polygon points.
 */
export function flattenPath(vertices: MaskVertex[], width: number, height: number): Point[] {
  const points: Point[] = [];
  vertices.forEach((vertex, i) => {
    const next = vertices[(i + 1) % vertices.length];
    const start = toPixels(vertex.position, width, height);
    points.push(start);
    if (!next) return;

    const controls = segmentControls(vertex, next, width, height);
    if (!controls) return;

    const end = toPixels(next.position, width, height);
    const [c1, c2] = controls;
    const hull =
      Math.hypot(c1.x - start.x, c1.y - start.y) +
      Math.hypot(c2.x - c1.x, c2.y - c1.y) +
      Math.hypot(end.x - c2.x, end.y - c2.y);
    const steps = Math.min(64, Math.max(4, Math.ceil(hull / 4)));
    for (let step = 1; step < steps; step++) {
      points.push(cubicAt(start, c1, c2, end, step / steps));
    }
  });
  return points;
}

function polygonSpans(geometry: FreehandGeometry, width: number, height: number): SpanSource {
  const points = flattenPath(geometry.vertices, width, height);
  return (y) => {
    const crossings: number[] = [];
    for (let i = 0; i < points.length; i++) {
      const a = points[i];
      const b = points[(i + 1) % points.length];
      if (!a || !b || a.y === b.y) continue;
      const minY = Math.min(a.y, b.y);
      const maxY = Math.max(a.y, b.y);
      if (y < minY || y >= maxY) continue;
      crossings.push(a.x + ((y - a.y) * (b.x - a.x)) / (b.y - a.y));
    }
    crossings.sort((p, q) => p - q);
    const spans: Array<[number, number]> = [];
    for (let i = 0; i + 1 < crossings.length; i += 2) {
      const start = crossings[i];
      const end = crossings[i + 1];
      if (start !== undefined && end !== undefined) spans.push([start, end]);
    }
    return spans;
  };
}

function fullMask(width: number, height: number): RenderedMask {
  return { pixelWidth: width, pixelHeight: height, bytes: new Uint8Array(width * height).fill(OPAQUE) };
}

function shapeSpans(
  geometry: Exclude<CropGeometry, { mode: 'ai' }>,
  width: number,
  height: number
): SpanSource {
  switch (geometry.mode) {
    case 'rectangle':
      return rectSpans(geometry.rect, width, height);
    case 'circle':
      return circleSpans(geometry, width, height);
    case 'freehand':
      return polygonSpans(geometry, width, height);
  }
}

/** Top-left `width` x `height` region of a mask */
function cropMask(mask: RenderedMask, width: number, height: number): RenderedMask {
  const bytes = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const start = y * mask.pixelWidth;
    bytes.set(mask.bytes.subarray(start, start + width), y * width);
  }
  return { pixelWidth: width, pixelHeight: height, bytes };
}

/**
 * Validate a tracker-supplied mask against the target size. Masks made at
 * the untrimmed source size are cropped to the even frame; any other size
 * is a mismatch.
 */
export function passthroughAiMask(
  mask: RenderedMask | undefined,
  maskRef: string,
  width: number,
  height: number,
  sourceSize?: { width: number; height: number }
): RenderedMask {
  if (!mask) {
    throw new CropExportError('invalid-input', `No AI mask available for reference "${maskRef}"`);
  }
  if (mask.pixelWidth === width && mask.pixelHeight === height) return mask;
  if (
    sourceSize &&
    mask.pixelWidth === sourceSize.width &&
    mask.pixelHeight === sourceSize.height &&
    sourceSize.width >= width &&
    sourceSize.height >= height
  ) {
    return cropMask(mask, width, height);
  }
  throw new CropExportError(
    'mask-resolution-mismatch',
    `AI mask "${maskRef}" is ${mask.pixelWidth}x${mask.pixelHeight}, expected ${width}x${height}`,
    {
      expected: { width, height },
      actual: { width: mask.pixelWidth, height: mask.pixelHeight },
    }
  );
}

/**
 * Rasterize crop geometry into a mask of the given size.
 *
 * Rectangles are only rasterized for animated exports; static rectangles
 * are handled by a plain crop stage.
 */
export function rasterizeMask(
  geometry: CropGeometry,
  width: number,
  height: number,
  options: RasterizeOptions = {}
): RenderedMask {
  assertTargetSize(width, height);

  if (geometry.mode === 'ai') {
    return passthroughAiMask(
      options.resolveAiMask?.(geometry.maskRef),
      geometry.maskRef,
      width,
      height,
      options.sourceSize
    );
  }
  if (isDegenerateGeometry(geometry)) return fullMask(width, height);

  const spans = shapeSpans(geometry, width, height);
  const bytes = options.antialias
    ? fillSupersampled(spans, width, height)
    : fillHard(spans, width, height);
  return { pixelWidth: width, pixelHeight: height, bytes };
}

export function countOpaquePixels(mask: RenderedMask): number {
  let count = 0;
  for (const value of mask.bytes) {
    if (value === OPAQUE) count++;
  }
  return count;
}
