/**
 * Filter-graph construction.
 *
 * Turns probed source properties, export settings and a summary of the
 * crop timeline into an encoder-agnostic FilterGraphSpec. The spec names
 * its stages and stream labels; turning it into command-line syntax is
 * the serializer's job.
 *
 * Masks are always rasterized at the even source size, and both the video
 * and the mask go through the same crop rect before compositing.
 */

import { CropExportError } from '@/lib/errors';
import type {
  ExportSettings,
  FilterGraphSpec,
  FilterStage,
  GraphInput,
  MaskInput,
  PixelRect,
  SourceVideoProperties,
  TimelineSummary,
} from '@/types/export';
import { DEFAULT_EXPORT_SETTINGS } from '@/types/export';
import { evenSourceSize, toPixelRect } from './dimensions';
import { selectEncoder } from './encoder-selection';

const SOURCE_LABEL = '0:v';
const MASK_LABEL = '1:v';
const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

/**
 * Whether the export composites a mask. Static rectangles are a plain
 * crop; animated rectangles become a mask sequence because a crop stage
 * cannot change its output size mid-stream.
 */
export function requiresMask(summary: TimelineSummary, settings: Pick<ExportSettings, 'preserveFullFrame'>): boolean {
  if (summary.kind === 'none') return false;
  if (summary.mode !== 'rectangle') return true;
  return summary.kind === 'dynamic' && !settings.preserveFullFrame;
}

function backgroundColor(settings: ExportSettings): string {
  const color = settings.backgroundColor ?? DEFAULT_EXPORT_SETTINGS.backgroundColor ?? '#000000';
  if (!HEX_COLOR.test(color)) {
    throw new CropExportError('invalid-input', `Background colour must be #rrggbb, got "${color}"`);
  }
  return color.toLowerCase();
}

function isFullFrame(rect: PixelRect, width: number, height: number): boolean {
  return rect.x === 0 && rect.y === 0 && rect.width === width && rect.height === height;
}

function buildMaskedStages(
  source: SourceVideoProperties,
  settings: ExportSettings,
  rect: PixelRect,
  frame: { width: number; height: number }
): { stages: FilterStage[]; outputLabel: string; output: { width: number; height: number } } {
  const stages: FilterStage[] = [
    { name: 'crop', input: SOURCE_LABEL, output: 'src', rect },
    { name: 'format', input: MASK_LABEL, output: 'gray', pixelFormat: 'gray' },
    { name: 'crop', input: 'gray', output: 'mask', rect },
  ];

  if (settings.enableAlpha) {
    stages.push({ name: 'alphamerge', inputs: ['src', 'mask'], output: 'masked' });
  } else {
    stages.push({
      name: 'background-blend',
      inputs: ['src', 'mask'],
      output: 'masked',
      color: backgroundColor(settings),
      width: rect.width,
      height: rect.height,
      frameRate: source.frameRate,
    });
  }

  if (!settings.preserveFullFrame) {
    return { stages, outputLabel: 'masked', output: { width: rect.width, height: rect.height } };
  }

  stages.push({
    name: 'pad',
    input: 'masked',
    output: 'padded',
    width: frame.width,
    height: frame.height,
    x: rect.x,
    y: rect.y,
    color: settings.enableAlpha ? 'transparent' : backgroundColor(settings),
  });
  return { stages, outputLabel: 'padded', output: frame };
}

function assertSource(source: SourceVideoProperties): void {
  if (!Number.isFinite(source.frameRate) || source.frameRate <= 0) {
    throw new CropExportError('invalid-input', `Invalid source frame rate ${source.frameRate}`);
  }
}

/**
 * Build the filter graph for one export.
 *
 * @param mask - required when `requiresMask(summary, settings)` holds; must
 *   match the even source size
 */
export function buildFilterGraph(
  source: SourceVideoProperties,
  settings: ExportSettings,
  summary: TimelineSummary,
  mask?: MaskInput
): FilterGraphSpec {
  assertSource(source);
  const frame = evenSourceSize(source.width, source.height);
  const color = source.color;

  if (requiresMask(summary, settings)) {
    if (summary.kind === 'none') {
      throw new CropExportError('invalid-input', 'Masked export without a crop region');
    }
    if (!mask) {
      throw new CropExportError('invalid-input', `A mask is required for ${summary.mode} crops`);
    }
    if (mask.width !== frame.width || mask.height !== frame.height) {
      throw new CropExportError(
        'mask-resolution-mismatch',
        `Mask is ${mask.width}x${mask.height}, expected ${frame.width}x${frame.height}`,
        { expected: frame, actual: { width: mask.width, height: mask.height } }
      );
    }

    const rect = toPixelRect(summary.bounds, frame.width, frame.height);
    const masked = buildMaskedStages(source, settings, rect, frame);
    const inputs: GraphInput[] = [
      { index: 0, role: 'source' },
      { index: 1, role: 'mask', mask },
    ];
    return {
      inputs,
      stages: masked.stages,
      outputLabel: masked.outputLabel,
      output: masked.output,
      encoder: selectEncoder(source, settings, settings.enableAlpha),
      ...(color ? { color } : {}),
    };
  }

  // Unmasked: a static rectangle crop, or only the even-size trim
  let rect: PixelRect = { x: 0, y: 0, width: frame.width, height: frame.height };
  if (summary.kind === 'static' && summary.mode === 'rectangle' && !settings.preserveFullFrame) {
    rect = toPixelRect(summary.bounds, frame.width, frame.height);
  }

  const trimmed = frame.width !== source.width || frame.height !== source.height;
  const stages: FilterStage[] =
    isFullFrame(rect, frame.width, frame.height) && !trimmed
      ? []
      : [{ name: 'crop', input: SOURCE_LABEL, output: 'cropped', rect }];

  return {
    inputs: [{ index: 0, role: 'source' }],
    stages,
    outputLabel: stages.length > 0 ? 'cropped' : SOURCE_LABEL,
    output: { width: rect.width, height: rect.height },
    encoder: selectEncoder(source, settings, false),
    ...(color ? { color } : {}),
  };
}
