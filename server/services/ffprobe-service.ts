import { spawn } from 'child_process';
import { z } from 'zod';
import { createLogger } from '../../src/lib/logger.js';
import { CropExportError, excerptDiagnostics } from '../../src/lib/errors.js';
import type { ColorMetadata, SourceVideoProperties } from '../../src/types/export.js';
import { collectProcess, type SpawnProcess } from './process.js';

const log = createLogger('FfprobeService');

/**
 * Supplies source video properties for a file.
 */
export interface MediaProber {
  probe(sourcePath: string): Promise<SourceVideoProperties>;
}

const numeric = z.union([z.number(), z.string()]).optional();

const probeStreamSchema = z
  .object({
    codec_type: z.string().optional(),
    codec_name: z.string().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    avg_frame_rate: z.string().optional(),
    r_frame_rate: z.string().optional(),
    duration: numeric,
    bit_rate: numeric,
    bits_per_raw_sample: numeric,
    pix_fmt: z.string().optional(),
    color_primaries: z.string().optional(),
    color_transfer: z.string().optional(),
    color_space: z.string().optional(),
  })
  .passthrough();

const probeOutputSchema = z.object({
  streams: z.array(probeStreamSchema).default([]),
  format: z
    .object({
      duration: numeric,
      bit_rate: numeric,
    })
    .passthrough()
    .optional(),
});

type ProbeStream = z.infer<typeof probeStreamSchema>;

/**
 * Evaluate a fraction string such as "30000/1001". "0/0" and other
 * non-positive results yield undefined.
 */
export function parseFrameRate(fraction: string | undefined): number | undefined {
  if (!fraction) return undefined;
  const [numerator, denominator = '1'] = fraction.split('/');
  const value = Number(numerator) / Number(denominator);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function positiveNumber(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/** Bit depth from bits_per_raw_sample, or from a pixel format like yuv420p10le */
export function parseBitDepth(stream: Pick<ProbeStream, 'bits_per_raw_sample' | 'pix_fmt'>): number | undefined {
  const raw = positiveNumber(stream.bits_per_raw_sample);
  if (raw !== undefined) return Math.round(raw);
  const match = stream.pix_fmt ? /p(\d{2})(?:le|be)$/.exec(stream.pix_fmt) : null;
  if (match?.[1]) return Number(match[1]);
  return stream.pix_fmt ? 8 : undefined;
}

function colorMetadata(stream: ProbeStream): ColorMetadata | undefined {
  const color: ColorMetadata = {};
  if (stream.color_primaries) color.primaries = stream.color_primaries;
  if (stream.color_transfer) color.transfer = stream.color_transfer;
  if (stream.color_space) color.matrix = stream.color_space;
  return Object.keys(color).length > 0 ? color : undefined;
}

/**
 * Extract the properties of the first video stream from ffprobe's JSON.
 */
export function parseProbeOutput(output: unknown): SourceVideoProperties {
  const parsed = probeOutputSchema.safeParse(output);
  if (!parsed.success) {
    throw new CropExportError('invalid-input', 'Unrecognised ffprobe output');
  }
  const { streams, format } = parsed.data;
  const video = streams.find((stream) => stream.codec_type === 'video');
  if (!video) {
    throw new CropExportError('invalid-input', 'Source has no video stream');
  }
  if (!video.codec_name || !video.width || !video.height) {
    throw new CropExportError('invalid-input', 'Video stream is missing codec or dimensions');
  }

  const frameRate = parseFrameRate(video.avg_frame_rate) ?? parseFrameRate(video.r_frame_rate);
  if (frameRate === undefined) {
    throw new CropExportError('invalid-input', 'Video stream has no usable frame rate');
  }

  const properties: SourceVideoProperties = {
    width: video.width,
    height: video.height,
    frameRate,
    codec: video.codec_name,
  };
  const durationSeconds = positiveNumber(format?.duration) ?? positiveNumber(video.duration);
  if (durationSeconds !== undefined) properties.durationSeconds = durationSeconds;
  const bitRate = positiveNumber(video.bit_rate) ?? positiveNumber(format?.bit_rate);
  if (bitRate !== undefined) properties.bitRate = bitRate;
  const bitDepth = parseBitDepth(video);
  if (bitDepth !== undefined) properties.bitDepth = bitDepth;
  const color = colorMetadata(video);
  if (color) properties.color = color;
  return properties;
}

export class FfprobeService implements MediaProber {
  constructor(
    private readonly ffprobePath: string,
    private readonly spawnProcess: SpawnProcess = spawn
  ) {}

  async probe(sourcePath: string): Promise<SourceVideoProperties> {
    const args = ['-v', 'error', '-print_format', 'json', '-show_streams', '-show_format', sourcePath];
    log.debug(`Probing ${sourcePath}`);

    const result = await collectProcess(this.spawnProcess(this.ffprobePath, args)).catch((error: unknown) => {
      throw new CropExportError('invalid-input', `Could not run ${this.ffprobePath}`, { cause: error });
    });
    if (result.exitCode !== 0) {
      throw new CropExportError('invalid-input', `ffprobe failed for ${sourcePath}`, {
        exitCode: result.exitCode,
        diagnostics: excerptDiagnostics(result.stderr),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw new CropExportError('invalid-input', 'ffprobe returned malformed JSON', { cause: error });
    }
    return parseProbeOutput(json);
  }
}
