/**
 * FFmpeg syntax for a FilterGraphSpec.
 */

import { CropExportError } from '@/lib/errors';
import type { ColorMetadata, FilterGraphSpec, FilterStage, GraphInput, RateControl } from '@/types/export';

type MaskGraphInput = Extract<GraphInput, { role: 'mask' }>;

function label(name: string): string {
  return `[${name}]`;
}

function ffmpegColor(color: string): string {
  return color === 'transparent' ? 'black@0' : `0x${color.slice(1)}`;
}

export interface SerializeOptions {
  /** Merge ends with the shorter input, for masks that loop without end */
  stopWithSource?: boolean;
}

function serializeStage(stage: FilterStage, options: SerializeOptions): string {
  const merge = options.stopWithSource ? 'alphamerge=shortest=1' : 'alphamerge';
  switch (stage.name) {
    case 'crop': {
      const { width, height, x, y } = stage.rect;
      return `${label(stage.input)}crop=${width}:${height}:${x}:${y}${label(stage.output)}`;
    }
    case 'format':
      return `${label(stage.input)}format=${stage.pixelFormat}${label(stage.output)}`;
    case 'alphamerge':
      return `${label(stage.inputs[0])}${label(stage.inputs[1])}${merge}${label(stage.output)}`;
    case 'background-blend': {
      const bg = `${stage.output}_bg`;
      const fg = `${stage.output}_fg`;
      return [
        `color=c=${ffmpegColor(stage.color)}:s=${stage.width}x${stage.height}:r=${stage.frameRate}${label(bg)}`,
        `${label(stage.inputs[0])}${label(stage.inputs[1])}${merge}${label(fg)}`,
        `${label(bg)}${label(fg)}overlay=shortest=1${label(stage.output)}`,
      ].join(';');
    }
    case 'pad':
      return (
        `${label(stage.input)}pad=${stage.width}:${stage.height}:${stage.x}:${stage.y}` +
        `:color=${ffmpegColor(stage.color)}${label(stage.output)}`
      );
  }
}

/** `-filter_complex` value, or null when the graph has no stages */
export function serializeFilterGraph(spec: FilterGraphSpec, options: SerializeOptions = {}): string | null {
  if (spec.stages.length === 0) return null;
  return spec.stages.map((stage) => serializeStage(stage, options)).join(';');
}

function rateControlArgs(encoder: string, rate: RateControl): string[] {
  switch (rate.mode) {
    case 'crf':
      if (encoder === 'libvpx-vp9') return ['-crf', String(rate.value), '-b:v', '0'];
      if (encoder === 'libx264' || encoder === 'libx265') {
        return ['-crf', String(rate.value), '-preset', 'medium'];
      }
      return ['-crf', String(rate.value)];
    case 'bitrate':
      return ['-b:v', `${rate.kbps}k`];
    case 'profile':
      return ['-profile:v', rate.profile];
  }
}

const UNSET_COLOR_VALUES = new Set(['', 'unknown', 'reserved', 'unspecified']);

export function colorArgs(color: ColorMetadata | undefined): string[] {
  if (!color) return [];
  const args: string[] = [];
  const push = (flag: string, value: string | undefined): void => {
    if (value !== undefined && !UNSET_COLOR_VALUES.has(value)) args.push(flag, value);
  };
  push('-color_primaries', color.primaries);
  push('-color_trc', color.transfer);
  push('-colorspace', color.matrix);
  return args;
}

export interface EncoderInvocation {
  sourcePath: string;
  outputPath: string;
  /** Still image, or an ffconcat script for a mask sequence */
  maskPath?: string;
  /**
   * Source duration when known. Bounds the output with `-t`; without it a
   * looped still mask ends with the source instead.
   */
  durationSeconds?: number;
}

/**
 * Full argument list (without the executable and progress flags).
 */
export function buildEncoderArgs(spec: FilterGraphSpec, invocation: EncoderInvocation): string[] {
  const args = ['-y', '-i', invocation.sourcePath];

  const maskInput = spec.inputs.find((input): input is MaskGraphInput => input.role === 'mask');
  const bounded = invocation.durationSeconds !== undefined && invocation.durationSeconds > 0;
  if (maskInput) {
    if (!invocation.maskPath) {
      throw new CropExportError('invalid-input', 'Filter graph expects a mask input but no mask path was given');
    }
    if (maskInput.mask.kind === 'sequence') {
      args.push('-f', 'concat', '-safe', '0', '-i', invocation.maskPath);
    } else {
      args.push('-loop', '1', '-i', invocation.maskPath);
    }
  }

  // a concat sequence ends by itself and its last mask holds until the source ends
  const graph = serializeFilterGraph(spec, { stopWithSource: maskInput?.mask.kind === 'still' && !bounded });
  if (graph) {
    args.push('-filter_complex', graph, '-map', label(spec.outputLabel));
  } else {
    args.push('-map', spec.outputLabel);
  }
  args.push('-map', '0:a?');

  const { encoder } = spec;
  args.push('-c:v', encoder.encoder, ...rateControlArgs(encoder.encoder, encoder.rateControl));
  args.push('-pix_fmt', encoder.pixelFormat);
  args.push(...colorArgs(spec.color));
  args.push('-c:a', 'copy', '-map_metadata', '0');

  if (maskInput && bounded) {
    args.push('-t', String(invocation.durationSeconds));
  }

  args.push(invocation.outputPath);
  return args;
}
