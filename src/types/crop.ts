/**
 * Crop geometry and keyframe types.
 * All coordinates are normalized to the 0-1 range of the source frame.
 */

export interface NormalizedPoint {
  x: number;
  y: number;
}

export interface NormalizedRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Crop modes; a timeline uses exactly one */
export type CropMode = 'rectangle' | 'circle' | 'freehand' | 'ai';

/**
 * Freehand polygon vertex.
 * Handles are offsets from the position, in normalized units.
 */
export interface MaskVertex {
  position: NormalizedPoint;
  controlIn?: NormalizedPoint;
  controlOut?: NormalizedPoint;
}

export interface RectangleGeometry {
  mode: 'rectangle';
  rect: NormalizedRect;
}

export interface CircleGeometry {
  mode: 'circle';
  center: NormalizedPoint;
  /** Radius as a fraction of min(frameWidth, frameHeight) */
  radius: number;
}

export interface FreehandGeometry {
  mode: 'freehand';
  /** Ordered polygon vertices; fewer than 3 means "no crop" */
  vertices: MaskVertex[];
}

export interface AiGeometry {
  mode: 'ai';
  boundingBox: NormalizedRect;
  /** Key into the AI mask library supplied by the tracker */
  maskRef: string;
}

export type CropGeometry = RectangleGeometry | CircleGeometry | FreehandGeometry | AiGeometry;

/** Geometry payload matching a given mode */
export type GeometryFor<M extends CropMode> = Extract<CropGeometry, { mode: M }>;

/** Easing applied when interpolating FROM a keyframe to the next one */
export type EasingType = 'linear' | 'ease-in' | 'ease-out' | 'ease-in-out' | 'hold';

export interface CropKeyframe {
  id: string;
  /** Seconds from the start of the video */
  timestamp: number;
  geometry: CropGeometry;
  easing: EasingType;
}

/**
 * Sorted, timestamp-unique keyframes for one video.
 * Treated as an immutable value; operations return new timelines.
 */
export interface CropTimeline {
  mode: CropMode;
  keyframes: CropKeyframe[];
}

export const CROP_MODES: CropMode[] = ['rectangle', 'circle', 'freehand', 'ai'];

export const EASING_TYPES: EasingType[] = ['linear', 'ease-in', 'ease-out', 'ease-in-out', 'hold'];

export const EASING_LABELS: Record<EasingType, string> = {
  'linear': 'Linear',
  'ease-in': 'Ease In',
  'ease-out': 'Ease Out',
  'ease-in-out': 'Ease In Out',
  'hold': 'Hold',
};

/** Smallest normalized width/height a rect or circle may shrink to */
export const MIN_NORMALIZED_SIZE = 0.001;

/** Vertices needed for a freehand polygon to enclose an area */
export const MIN_POLYGON_VERTICES = 3;
