/**
 * Application configuration from environment variables
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const workers = config.export.maskWorkers;
 *
 * loadConfig() takes any env-like object so tests never touch process.env.
 */

import os from 'os';
import { z } from 'zod';
import { HARDWARE_BACKENDS, type HardwareBackend } from '@/types/export';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  EXPORT_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  MASK_WORKERS: z.coerce.number().int().min(1).max(64).default(4),
  KEEP_MASKS: booleanFlag.default('false'),
  MASK_TEMP_DIR: z.string().min(1).optional(),
  HARDWARE_BACKEND: z.enum(HARDWARE_BACKENDS).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
});

export interface AppConfig {
  env: string;
  isDev: boolean;
  isProd: boolean;
  ffmpeg: {
    ffmpegPath: string;
    ffprobePath: string;
    hardwareBackend: HardwareBackend;
  };
  export: {
    /** Jobs allowed to run at the same time */
    concurrency: number;
    /** Parallel mask rasterization tasks per job */
    maskWorkers: number;
    /** Retain written masks after a job ends (debugging) */
    keepMasks: boolean;
    maskTempDir: string;
  };
  server: {
    port: number;
    host: string;
    corsOrigins: string[];
  };
}

function defaultHardwareBackend(platform: NodeJS.Platform): HardwareBackend {
  return platform === 'darwin' ? 'videotoolbox' : 'nvenc';
}

export function loadConfig(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;

  return {
    env: values.NODE_ENV,
    isDev: values.NODE_ENV !== 'production',
    isProd: values.NODE_ENV === 'production',
    ffmpeg: {
      ffmpegPath: values.FFMPEG_PATH,
      ffprobePath: values.FFPROBE_PATH,
      hardwareBackend: values.HARDWARE_BACKEND ?? defaultHardwareBackend(platform),
    },
    export: {
      concurrency: values.EXPORT_CONCURRENCY,
      maskWorkers: values.MASK_WORKERS,
      keepMasks: values.KEEP_MASKS,
      maskTempDir: values.MASK_TEMP_DIR ?? os.tmpdir(),
    },
    server: {
      port: values.PORT,
      host: values.HOST,
      corsOrigins: values.CORS_ORIGIN.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
  };
}

export const config: AppConfig = loadConfig(process.env);
