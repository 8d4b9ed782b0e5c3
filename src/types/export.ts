import type { CropGeometry, CropMode, NormalizedRect } from './crop';

export const HARDWARE_BACKENDS = ['videotoolbox', 'nvenc', 'qsv', 'amf'] as const;
export type HardwareBackend = (typeof HARDWARE_BACKENDS)[number];

/** Logical codec families the encoder table knows */
export type CodecFamily = 'h264' | 'hevc' | 'prores' | 'vp9' | 'av1';

/** Requested output codec; 'source' matches the probed source codec */
export type CodecHint = CodecFamily | 'source';

export interface ExportSettings {
  /** Keep the source frame size instead of shrinking to the crop */
  preserveFullFrame: boolean;
  /** Composite the mask as an alpha channel instead of onto a background */
  enableAlpha: boolean;
  codecHint: CodecHint;
  useHardwareEncoder: boolean;
  /** Hardware family to target when useHardwareEncoder is set */
  hardwareBackend?: HardwareBackend;
  /** `#rrggbb` used behind masked crops when alpha is off */
  backgroundColor?: string;
}

export const DEFAULT_EXPORT_SETTINGS: ExportSettings = {
  preserveFullFrame: false,
  enableAlpha: false,
  codecHint: 'source',
  useHardwareEncoder: false,
  backgroundColor: '#000000',
};

export interface ColorMetadata {
  primaries?: string;
  transfer?: string;
  matrix?: string;
}

/** Properties reported by the media prober */
export interface SourceVideoProperties {
  width: number;
  height: number;
  frameRate: number;
  /** Codec name as reported by the prober, e.g. "h264", "prores" */
  codec: string;
  durationSeconds?: number;
  bitRate?: number;
  bitDepth?: number;
  color?: ColorMetadata;
}

/** Single-channel 8-bit mask, row-major, 255 = visible */
export interface RenderedMask {
  pixelWidth: number;
  pixelHeight: number;
  bytes: Uint8Array;
}

/**
 * What the orchestrator learned about a timeline over the export duration.
 * - none: no crop is applied (empty or degenerate timeline)
 * - static: one geometry holds for every output frame
 * - dynamic: geometry changes between output frames
 */
export type TimelineSummary =
  | { kind: 'none'; mode: CropMode }
  | { kind: 'static'; mode: CropMode; geometry: CropGeometry; bounds: NormalizedRect }
  | { kind: 'dynamic'; mode: CropMode; bounds: NormalizedRect };

/** Mask input handed to the filter-graph builder */
export interface MaskInput {
  kind: 'still' | 'sequence';
  width: number;
  height: number;
}

export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Stream reference for a graph input: 0 = source video, 1 = mask */
export type GraphInput =
  | { index: 0; role: 'source' }
  | { index: 1; role: 'mask'; mask: MaskInput };

export type FilterStage =
  | { name: 'crop'; input: string; output: string; rect: PixelRect }
  | { name: 'format'; input: string; output: string; pixelFormat: string }
  | { name: 'alphamerge'; inputs: [string, string]; output: string }
  | {
      name: 'background-blend';
      inputs: [string, string];
      output: string;
      color: string;
      width: number;
      height: number;
      frameRate: number;
    }
  | {
      name: 'pad';
      input: string;
      output: string;
      width: number;
      height: number;
      x: number;
      y: number;
      /** `#rrggbb` or 'transparent' */
      color: string;
    };

export type FilterStageName = FilterStage['name'];

export type RateControl =
  | { mode: 'crf'; value: number }
  | { mode: 'bitrate'; kbps: number }
  | { mode: 'profile'; profile: string };

export interface EncoderSelection {
  family: CodecFamily;
  encoder: string;
  hardware: boolean;
  pixelFormat: string;
  rateControl: RateControl;
  supportsAlpha: boolean;
}

/**
 * Encoder-agnostic description of one export.
 * `stages` is empty when the source passes through untouched.
 */
export interface FilterGraphSpec {
  inputs: GraphInput[];
  stages: FilterStage[];
  /** Label of the stream to encode; '0:v' when there are no stages */
  outputLabel: string;
  output: { width: number; height: number };
  encoder: EncoderSelection;
  color?: ColorMetadata;
}
