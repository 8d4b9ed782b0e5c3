import { EventEmitter } from 'events';
import { existsSync, readFileSync } from 'fs';
import { PassThrough } from 'stream';
import { CropExportError } from '../../src/lib/errors.js';
import type { SourceVideoProperties } from '../../src/types/export.js';
import type { MediaProber } from '../services/ffprobe-service.js';
import type { EncodeRequest, VideoEncoder } from '../services/ffmpeg-encoder.js';

export class FakeProber implements MediaProber {
  readonly calls: string[] = [];

  constructor(private readonly properties: SourceVideoProperties) {}

  async probe(sourcePath: string): Promise<SourceVideoProperties> {
    this.calls.push(sourcePath);
    return { ...this.properties };
  }
}

export type FakeEncodeBehavior =
  | { kind: 'succeed'; progress?: number[] }
  | { kind: 'fail'; exitCode: number; stderr: string }
  | { kind: 'hang' };

export interface MaskSnapshot {
  path: string;
  existed: boolean;
  script?: string;
}

/**
 * In-process encoder. Behaviour is chosen per output path; anything not
 * configured succeeds.
 */
export class FakeEncoder implements VideoEncoder {
  readonly calls: EncodeRequest[] = [];
  readonly maskSnapshots: MaskSnapshot[] = [];
  private readonly behaviors = new Map<string, FakeEncodeBehavior>();
  private waiters: Array<{ count: number; resolve: () => void }> = [];

  behave(outputPath: string, behavior: FakeEncodeBehavior): this {
    this.behaviors.set(outputPath, behavior);
    return this;
  }

  /** Resolves once `count` encodes have started */
  waitForCalls(count: number): Promise<void> {
    if (this.calls.length >= count) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push({ count, resolve }));
  }

  async encode(request: EncodeRequest): Promise<void> {
    this.calls.push(request);
    const maskPath = request.invocation.maskPath;
    if (maskPath) {
      const existed = existsSync(maskPath);
      this.maskSnapshots.push({
        path: maskPath,
        existed,
        ...(existed && maskPath.endsWith('.ffconcat') ? { script: readFileSync(maskPath, 'utf8') } : {}),
      });
    }
    this.waiters = this.waiters.filter((waiter) => {
      if (this.calls.length < waiter.count) return true;
      waiter.resolve();
      return false;
    });

    const behavior = this.behaviors.get(request.invocation.outputPath) ?? { kind: 'succeed' };
    switch (behavior.kind) {
      case 'succeed':
        for (const fraction of behavior.progress ?? []) {
          request.onProgress?.(fraction);
        }
        request.onProgress?.(1);
        return;
      case 'fail':
        throw new CropExportError('encoder-process-failure', `Encoder exited with code ${behavior.exitCode}`, {
          exitCode: behavior.exitCode,
          diagnostics: behavior.stderr,
        });
      case 'hang':
        await new Promise<void>((_resolve, reject) => {
          const abort = (): void => reject(new CropExportError('cancelled'));
          if (request.signal?.aborted) abort();
          else request.signal?.addEventListener('abort', abort, { once: true });
        });
    }
  }
}

/**
 * Child-process stand-in with writable stdout/stderr.
 */
export class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    return true;
  }

  /** Flush output, then report the exit on a later turn */
  exit(code: number | null, output: { stdout?: string; stderr?: string } = {}): void {
    if (output.stdout) this.stdout.write(output.stdout);
    if (output.stderr) this.stderr.write(output.stderr);
    setImmediate(() => this.emit('close', code));
  }
}

/** Let pending stream and timer callbacks run */
export function flushEvents(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
