/**
 * Deterministic encoder table.
 *
 * Every (codec family, hardware backend) pair maps to exactly one encoder.
 * A backend without an entry falls back to the family's software encoder;
 * an unknown family or an alpha request on a family that cannot carry
 * alpha fails with `unsupported-codec`.
 */

import { CropExportError } from '@/lib/errors';
import type {
  CodecFamily,
  EncoderSelection,
  ExportSettings,
  HardwareBackend,
  RateControl,
  SourceVideoProperties,
} from '@/types/export';

interface EncoderFamilyEntry {
  software: string;
  hardware: Partial<Record<HardwareBackend, string>>;
  /** Encoders able to write an alpha plane */
  alphaEncoders: string[];
  crf?: number;
}

export const ENCODER_TABLE: Record<CodecFamily, EncoderFamilyEntry> = {
  h264: {
    software: 'libx264',
    hardware: { videotoolbox: 'h264_videotoolbox', nvenc: 'h264_nvenc', qsv: 'h264_qsv', amf: 'h264_amf' },
    alphaEncoders: [],
    crf: 18,
  },
  hevc: {
    software: 'libx265',
    hardware: { videotoolbox: 'hevc_videotoolbox', nvenc: 'hevc_nvenc', qsv: 'hevc_qsv', amf: 'hevc_amf' },
    alphaEncoders: [],
    crf: 20,
  },
  prores: {
    software: 'prores_ks',
    hardware: { videotoolbox: 'prores_videotoolbox' },
    alphaEncoders: ['prores_ks', 'prores_videotoolbox'],
  },
  vp9: {
    software: 'libvpx-vp9',
    hardware: { qsv: 'vp9_qsv' },
    alphaEncoders: ['libvpx-vp9'],
    crf: 30,
  },
  av1: {
    software: 'libsvtav1',
    hardware: { nvenc: 'av1_nvenc', qsv: 'av1_qsv', amf: 'av1_amf' },
    alphaEncoders: [],
    crf: 30,
  },
};

const CODEC_ALIASES: Record<string, CodecFamily> = {
  h264: 'h264',
  avc: 'h264',
  avc1: 'h264',
  hevc: 'hevc',
  h265: 'hevc',
  hvc1: 'hevc',
  hev1: 'hevc',
  prores: 'prores',
  apcn: 'prores',
  apch: 'prores',
  ap4h: 'prores',
  vp9: 'vp9',
  vp09: 'vp9',
  av1: 'av1',
  av01: 'av1',
};

/** Hardware bitrate when the source does not report one */
export const DEFAULT_HARDWARE_KBPS = 10_000;

export function codecFamilyFromName(codec: string): CodecFamily {
  const family = CODEC_ALIASES[codec.trim().toLowerCase()];
  if (!family) {
    throw new CropExportError('unsupported-codec', `No encoder family for source codec "${codec}"`, {
      codec,
    });
  }
  return family;
}

function pixelFormatFor(
  family: CodecFamily,
  alpha: boolean,
  hardware: boolean,
  bitDepth: number | undefined
): string {
  if (alpha) return family === 'prores' ? 'yuva444p10le' : 'yuva420p';
  if (family === 'prores') return 'yuv422p10le';
  if ((bitDepth ?? 8) > 8 && family !== 'h264') {
    return hardware ? 'p010le' : 'yuv420p10le';
  }
  return 'yuv420p';
}

function rateControlFor(
  family: CodecFamily,
  entry: EncoderFamilyEntry,
  alpha: boolean,
  hardware: boolean,
  bitRate: number | undefined
): RateControl {
  if (family === 'prores') return { mode: 'profile', profile: alpha ? '4444' : 'hq' };
  if (hardware || entry.crf === undefined) {
    const kbps = bitRate && bitRate > 0 ? Math.round((bitRate * 0.9) / 1000) : DEFAULT_HARDWARE_KBPS;
    return { mode: 'bitrate', kbps };
  }
  return { mode: 'crf', value: entry.crf };
}

export function selectEncoder(
  source: Pick<SourceVideoProperties, 'codec' | 'bitRate' | 'bitDepth'>,
  settings: Pick<ExportSettings, 'codecHint' | 'enableAlpha' | 'useHardwareEncoder' | 'hardwareBackend'>,
  wantsAlpha: boolean = settings.enableAlpha
): EncoderSelection {
  const family = settings.codecHint === 'source' ? codecFamilyFromName(source.codec) : settings.codecHint;
  const entry = ENCODER_TABLE[family];

  if (wantsAlpha && entry.alphaEncoders.length === 0) {
    throw new CropExportError('unsupported-codec', `${family} cannot carry an alpha channel`, {
      codec: family,
    });
  }

  let encoder = entry.software;
  if (settings.useHardwareEncoder && settings.hardwareBackend) {
    const candidate = entry.hardware[settings.hardwareBackend];
    if (candidate && (!wantsAlpha || entry.alphaEncoders.includes(candidate))) {
      encoder = candidate;
    }
  }
  const hardware = encoder !== entry.software;

  return {
    family,
    encoder,
    hardware,
    pixelFormat: pixelFormatFor(family, wantsAlpha, hardware, source.bitDepth),
    rateControl: rateControlFor(family, entry, wantsAlpha, hardware, source.bitRate),
    supportsAlpha: entry.alphaEncoders.includes(encoder),
  };
}
