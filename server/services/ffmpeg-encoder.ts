import { spawn } from 'child_process';
import { createLogger } from '../../src/lib/logger.js';
import { CropExportError, excerptDiagnostics, MAX_DIAGNOSTICS_LENGTH } from '../../src/lib/errors.js';
import { buildEncoderArgs, type EncoderInvocation } from '../../src/features/export/utils/filter-serializer.js';
import type { FilterGraphSpec } from '../../src/types/export.js';
import type { SpawnedProcess, SpawnProcess } from './process.js';

const log = createLogger('FfmpegEncoder');

/** Grace period between SIGTERM and SIGKILL on cancellation */
export const KILL_GRACE_MS = 1000;

/** Progress stays below this until the process exits cleanly */
export const MAX_RUNNING_PROGRESS = 0.99;

export interface EncodeRequest {
  spec: FilterGraphSpec;
  invocation: EncoderInvocation;
  /** Length of the output, used to turn encoder time into a fraction */
  durationSeconds: number;
  onProgress?: (fraction: number) => void;
  signal?: AbortSignal;
}

/**
 * Runs one export. Resolves on success; rejects with a CropExportError of
 * type `encoder-process-failure` or `cancelled`.
 */
export interface VideoEncoder {
  encode(request: EncodeRequest): Promise<void>;
}

/**
 * Parses `-progress pipe:1` output, which arrives as key=value lines in
 * arbitrary chunks. `out_time_us` and `out_time_ms` both carry
 * microseconds.
 */
export class ProgressParser {
  private buffer = '';
  private last = 0;

  constructor(private readonly durationSeconds: number) {}

  /** Returns the new fraction when it advanced */
  push(chunk: string): number | undefined {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    let advanced: number | undefined;
    for (const line of lines) {
      const fraction = this.parseLine(line.trim());
      if (fraction !== undefined && fraction > this.last) {
        this.last = fraction;
        advanced = fraction;
      }
    }
    return advanced;
  }

  get current(): number {
    return this.last;
  }

  private parseLine(line: string): number | undefined {
    const separator = line.indexOf('=');
    if (separator < 0) return undefined;
    const key = line.slice(0, separator);
    if (key !== 'out_time_us' && key !== 'out_time_ms') return undefined;
    if (this.durationSeconds <= 0) return undefined;
    const micros = Number(line.slice(separator + 1));
    if (!Number.isFinite(micros) || micros < 0) return undefined;
    return Math.min(MAX_RUNNING_PROGRESS, micros / 1_000_000 / this.durationSeconds);
  }
}

export class FfmpegEncoder implements VideoEncoder {
  constructor(
    private readonly ffmpegPath: string,
    private readonly spawnProcess: SpawnProcess = spawn
  ) {}

  encode(request: EncodeRequest): Promise<void> {
    const { spec, invocation, durationSeconds, onProgress, signal } = request;
    const args = ['-hide_banner', '-nostats', '-progress', 'pipe:1', ...buildEncoderArgs(spec, invocation)];

    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CropExportError('cancelled'));
        return;
      }

      log.debug(`Spawning ${this.ffmpegPath} ${args.join(' ')}`);
      let child: SpawnedProcess;
      try {
        child = this.spawnProcess(this.ffmpegPath, args);
      } catch (error) {
        reject(new CropExportError('encoder-process-failure', `Could not start ${this.ffmpegPath}`, { cause: error }));
        return;
      }

      const progress = new ProgressParser(durationSeconds);
      let stderr = '';
      let killTimer: NodeJS.Timeout | null = null;
      let settled = false;

      const finish = (error?: CropExportError): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', abortHandler);
        if (killTimer) clearTimeout(killTimer);
        if (error) reject(error);
        else resolve();
      };

      const abortHandler = (): void => {
        log.debug('Abort requested, stopping encoder');
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
        killTimer.unref();
      };
      signal?.addEventListener('abort', abortHandler, { once: true });

      child.stdout?.on('data', (chunk: Buffer | string) => {
        const fraction = progress.push(chunk.toString());
        if (fraction !== undefined) onProgress?.(fraction);
      });

      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr += chunk.toString();
        // only the tail is ever reported
        if (stderr.length > MAX_DIAGNOSTICS_LENGTH * 8) {
          stderr = stderr.slice(stderr.length - MAX_DIAGNOSTICS_LENGTH * 2);
        }
      });

      child.on('error', (error) => {
        finish(new CropExportError('encoder-process-failure', `Encoder process error: ${error.message}`, {
          cause: error,
          diagnostics: excerptDiagnostics(stderr),
        }));
      });

      child.on('close', (code) => {
        if (signal?.aborted) {
          finish(new CropExportError('cancelled'));
          return;
        }
        if (code === 0) {
          onProgress?.(1);
          finish();
          return;
        }
        finish(new CropExportError('encoder-process-failure', `Encoder exited with code ${code}`, {
          exitCode: code,
          diagnostics: excerptDiagnostics(stderr),
        }));
      });
    });
  }
}
