import { describe, expect, it } from 'vitest';
import { CropExportError } from '../../src/lib/errors.js';
import { FakeProcess } from '../test/fakes.js';
import { FfprobeService, parseBitDepth, parseFrameRate, parseProbeOutput } from './ffprobe-service.js';

const hdrProbe = {
  streams: [
    { codec_type: 'audio', codec_name: 'aac', bit_rate: '128000' },
    {
      codec_type: 'video',
      codec_name: 'hevc',
      width: 3840,
      height: 2160,
      avg_frame_rate: '30000/1001',
      r_frame_rate: '30000/1001',
      bit_rate: '40000000',
      pix_fmt: 'yuv420p10le',
      color_primaries: 'bt2020',
      color_transfer: 'smpte2084',
      color_space: 'bt2020nc',
    },
  ],
  format: { duration: '12.500000', bit_rate: '41000000' },
};

function errorType(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof CropExportError ? error.type : 'unexpected';
  }
  return undefined;
}

describe('parseFrameRate', () => {
  it('evaluates fractions', () => {
    expect(parseFrameRate('25/1')).toBe(25);
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    expect(parseFrameRate('24')).toBe(24);
  });

  it('rejects empty and zero rates', () => {
    expect(parseFrameRate('0/0')).toBeUndefined();
    expect(parseFrameRate(undefined)).toBeUndefined();
  });
});

describe('parseBitDepth', () => {
  it('prefers bits_per_raw_sample', () => {
    expect(parseBitDepth({ bits_per_raw_sample: '12', pix_fmt: 'yuv420p10le' })).toBe(12);
  });

  it('falls back to the pixel format', () => {
    expect(parseBitDepth({ pix_fmt: 'yuv422p10le' })).toBe(10);
    expect(parseBitDepth({ pix_fmt: 'yuv420p' })).toBe(8);
    expect(parseBitDepth({})).toBeUndefined();
  });
});

describe('parseProbeOutput', () => {
  it('reads the first video stream', () => {
    expect(parseProbeOutput(hdrProbe)).toEqual({
      width: 3840,
      height: 2160,
      frameRate: 30000 / 1001,
      codec: 'hevc',
      durationSeconds: 12.5,
      bitRate: 40_000_000,
      bitDepth: 10,
      color: { primaries: 'bt2020', transfer: 'smpte2084', matrix: 'bt2020nc' },
    });
  });

  it('falls back to r_frame_rate and the container bitrate', () => {
    const properties = parseProbeOutput({
      streams: [
        {
          codec_type: 'video',
          codec_name: 'h264',
          width: 1365,
          height: 767,
          avg_frame_rate: '0/0',
          r_frame_rate: '24/1',
        },
      ],
      format: { bit_rate: '8000000' },
    });
    expect(properties).toEqual({ width: 1365, height: 767, frameRate: 24, codec: 'h264', bitRate: 8_000_000 });
  });

  it('rejects sources without a video stream', () => {
    expect(errorType(() => parseProbeOutput({ streams: [{ codec_type: 'audio', codec_name: 'aac' }] }))).toBe(
      'invalid-input'
    );
    expect(errorType(() => parseProbeOutput('not an object'))).toBe('invalid-input');
  });
});

describe('FfprobeService', () => {
  it('runs ffprobe with JSON output and parses the result', async () => {
    const child = new FakeProcess();
    const calls: Array<readonly string[]> = [];
    const service = new FfprobeService('ffprobe', (_command, args) => {
      calls.push(args);
      return child;
    });

    const result = service.probe('/videos/clip.mov');
    child.exit(0, { stdout: JSON.stringify(hdrProbe) });

    expect((await result).codec).toBe('hevc');
    expect(calls[0]).toEqual([
      '-v',
      'error',
      '-print_format',
      'json',
      '-show_streams',
      '-show_format',
      '/videos/clip.mov',
    ]);
  });

  it('reports a failed probe with its stderr', async () => {
    const child = new FakeProcess();
    const service = new FfprobeService('ffprobe', () => child);

    const result = service.probe('/videos/missing.mov');
    child.exit(1, { stderr: '/videos/missing.mov: No such file or directory\n' });

    await expect(result).rejects.toMatchObject({
      type: 'invalid-input',
      details: { exitCode: 1, diagnostics: '/videos/missing.mov: No such file or directory' },
    });
  });
});
