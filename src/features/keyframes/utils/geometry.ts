/**
 * Geometry helpers: clamping constructors, validation, denormalization
 * and bounding boxes for every crop mode.
 */

import { CropExportError } from '@/lib/errors';
import type {
  AiGeometry,
  CircleGeometry,
  CropGeometry,
  FreehandGeometry,
  MaskVertex,
  NormalizedPoint,
  NormalizedRect,
  RectangleGeometry,
} from '@/types/crop';
import { MIN_NORMALIZED_SIZE, MIN_POLYGON_VERTICES } from '@/types/crop';

export const FULL_FRAME_RECT: NormalizedRect = { x: 0, y: 0, width: 1, height: 1 };

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function createPoint(x: number, y: number): NormalizedPoint {
  return { x: clamp01(x), y: clamp01(y) };
}

/**
 * Clamp a rect into the unit square. Width and height never drop below
 * MIN_NORMALIZED_SIZE and the rect never extends past the right/bottom edge.
 */
export function createRect(x: number, y: number, width: number, height: number): NormalizedRect {
  const cx = Math.min(clamp01(x), 1 - MIN_NORMALIZED_SIZE);
  const cy = Math.min(clamp01(y), 1 - MIN_NORMALIZED_SIZE);
  return {
    x: cx,
    y: cy,
    width: Math.min(Math.max(width, MIN_NORMALIZED_SIZE), 1 - cx),
    height: Math.min(Math.max(height, MIN_NORMALIZED_SIZE), 1 - cy),
  };
}

export function rectangleGeometry(rect: NormalizedRect): RectangleGeometry {
  return { mode: 'rectangle', rect: createRect(rect.x, rect.y, rect.width, rect.height) };
}

export function circleGeometry(center: NormalizedPoint, radius: number): CircleGeometry {
  return {
    mode: 'circle',
    center: createPoint(center.x, center.y),
    radius: Math.min(1, Math.max(MIN_NORMALIZED_SIZE, radius)),
  };
}

export function freehandGeometry(vertices: Array<MaskVertex | NormalizedPoint>): FreehandGeometry {
  return {
    mode: 'freehand',
    vertices: vertices.map((vertex) => {
      const source: MaskVertex = 'position' in vertex ? vertex : { position: vertex };
      const normalized: MaskVertex = {
        position: createPoint(source.position.x, source.position.y),
      };
      if (source.controlIn) normalized.controlIn = { ...source.controlIn };
      if (source.controlOut) normalized.controlOut = { ...source.controlOut };
      return normalized;
    }),
  };
}

export function aiGeometry(boundingBox: NormalizedRect, maskRef: string): AiGeometry {
  return {
    mode: 'ai',
    boundingBox: createRect(boundingBox.x, boundingBox.y, boundingBox.width, boundingBox.height),
    maskRef,
  };
}

/**
 * Re-apply the clamping constructors to a geometry of any mode.
 */
export function normalizeGeometry(geometry: CropGeometry): CropGeometry {
  switch (geometry.mode) {
    case 'rectangle':
      return rectangleGeometry(geometry.rect);
    case 'circle':
      return circleGeometry(geometry.center, geometry.radius);
    case 'freehand':
      return freehandGeometry(geometry.vertices);
    case 'ai':
      return aiGeometry(geometry.boundingBox, geometry.maskRef);
  }
}

function collectNumbers(geometry: CropGeometry): number[] {
  switch (geometry.mode) {
    case 'rectangle':
      return [geometry.rect.x, geometry.rect.y, geometry.rect.width, geometry.rect.height];
    case 'circle':
      return [geometry.center.x, geometry.center.y, geometry.radius];
    case 'freehand':
      return geometry.vertices.flatMap((v) => [
        v.position.x,
        v.position.y,
        v.controlIn?.x ?? 0,
        v.controlIn?.y ?? 0,
        v.controlOut?.x ?? 0,
        v.controlOut?.y ?? 0,
      ]);
    case 'ai':
      return [
        geometry.boundingBox.x,
        geometry.boundingBox.y,
        geometry.boundingBox.width,
        geometry.boundingBox.height,
      ];
  }
}

/**
 * Reject geometry that cannot be clamped into range (NaN, Infinity) or an
 * AI geometry without a mask reference.
 */
export function assertValidGeometry(geometry: CropGeometry): void {
  if (collectNumbers(geometry).some((value) => !Number.isFinite(value))) {
    throw new CropExportError('invalid-geometry', `Non-finite coordinate in ${geometry.mode} geometry`);
  }
  if (geometry.mode === 'ai' && geometry.maskRef.length === 0) {
    throw new CropExportError('invalid-geometry', 'AI geometry requires a mask reference');
  }
}

/**
 * Fewer than three freehand vertices cannot enclose an area; such a
 * polygon means "no crop".
 */
export function isDegenerateGeometry(geometry: CropGeometry): boolean {
  return geometry.mode === 'freehand' && geometry.vertices.length < MIN_POLYGON_VERTICES;
}

export function denormalizePoint(point: NormalizedPoint, width: number, height: number): NormalizedPoint {
  return { x: point.x * width, y: point.y * height };
}

/** Circle radius in pixels for a given frame */
export function circleRadiusPixels(radius: number, width: number, height: number): number {
  return radius * Math.min(width, height);
}

function clampRectToUnit(left: number, top: number, right: number, bottom: number): NormalizedRect {
  const x = clamp01(left);
  const y = clamp01(top);
  return {
    x,
    y,
    width: Math.max(0, clamp01(right) - x),
    height: Math.max(0, clamp01(bottom) - y),
  };
}

/**
 * Normalized bounding box of the visible region, clamped to the frame.
 * The frame size matters for circles because their radius is measured
 * against the shorter side.
 */
export function geometryBounds(geometry: CropGeometry, width: number, height: number): NormalizedRect {
  switch (geometry.mode) {
    case 'rectangle':
      return { ...geometry.rect };
    case 'circle': {
      const r = circleRadiusPixels(geometry.radius, width, height);
      const rx = r / width;
      const ry = r / height;
      return clampRectToUnit(
        geometry.center.x - rx,
        geometry.center.y - ry,
        geometry.center.x + rx,
        geometry.center.y + ry
      );
    }
    case 'freehand': {
      if (isDegenerateGeometry(geometry)) return { ...FULL_FRAME_RECT };
      const xs = geometry.vertices.map((v) => v.position.x);
      const ys = geometry.vertices.map((v) => v.position.y);
      return clampRectToUnit(Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys));
    }
    case 'ai':
      return { ...geometry.boundingBox };
  }
}

export function unionRects(a: NormalizedRect, b: NormalizedRect): NormalizedRect {
  const left = Math.min(a.x, b.x);
  const top = Math.min(a.y, b.y);
  const right = Math.max(a.x + a.width, b.x + b.width);
  const bottom = Math.max(a.y + a.height, b.y + b.height);
  return { x: left, y: top, width: right - left, height: bottom - top };
}

function pointsEqual(a: NormalizedPoint | undefined, b: NormalizedPoint | undefined): boolean {
  if (!a || !b) return a === b;
  return a.x === b.x && a.y === b.y;
}

function rectsEqual(a: NormalizedRect, b: NormalizedRect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/**
 * Exact field-wise equality. Interpolation is deterministic, so equal
 * inputs always produce bit-identical geometry.
 */
export function geometriesEqual(a: CropGeometry, b: CropGeometry): boolean {
  switch (a.mode) {
    case 'rectangle':
      return b.mode === 'rectangle' && rectsEqual(a.rect, b.rect);
    case 'circle':
      return b.mode === 'circle' && pointsEqual(a.center, b.center) && a.radius === b.radius;
    case 'freehand':
      return (
        b.mode === 'freehand' &&
        a.vertices.length === b.vertices.length &&
        a.vertices.every((vertex, i) => {
          const other = b.vertices[i];
          return (
            other !== undefined &&
            pointsEqual(vertex.position, other.position) &&
            pointsEqual(vertex.controlIn, other.controlIn) &&
            pointsEqual(vertex.controlOut, other.controlOut)
          );
        })
      );
    case 'ai':
      return b.mode === 'ai' && a.maskRef === b.maskRef && rectsEqual(a.boundingBox, b.boundingBox);
  }
}
