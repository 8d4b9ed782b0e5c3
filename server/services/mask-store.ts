import fs from 'fs/promises';
import path from 'path';
import { createLogger } from '../../src/lib/logger.js';
import { CropExportError } from '../../src/lib/errors.js';
import { encodePgm } from '../../src/features/masks/utils/pgm.js';
import type { MaskInput, RenderedMask } from '../../src/types/export.js';

const log = createLogger('MaskStore');

export const CONCAT_SCRIPT_NAME = 'masks.ffconcat';

/** One rasterized mask and the number of output frames it covers */
export interface MaskRun {
  mask: RenderedMask;
  frameCount: number;
}

export interface WrittenMasks {
  /** Still image, or the concat script of a sequence */
  path: string;
  directory: string;
  input: MaskInput;
  fileCount: number;
}

/**
 * Receives masks one run at a time, so a bitmap can be dropped as soon as
 * its file is written.
 */
export interface MaskSession {
  readonly directory: string;
  /** Write the mask for run `index`; runs may arrive in any order */
  writeRun(index: number, run: MaskRun): Promise<void>;
  /** Write the concat script (for several runs) once every run is on disk */
  finish(runCount: number): Promise<WrittenMasks>;
  /** Remove everything written so far */
  discard(): Promise<void>;
}

export interface MaskWriter {
  open(jobId: string, size: { width: number; height: number }, frameRate: number): Promise<MaskSession>;
  release(masks: WrittenMasks): Promise<void>;
}

function maskFileName(index: number): string {
  return `mask-${String(index).padStart(5, '0')}.pgm`;
}

/**
 * ffconcat script holding one entry per run. The last file is listed a
 * second time so its duration is honoured by the demuxer.
 */
export function buildConcatScript(entries: Array<{ file: string; durationSeconds: number }>): string {
  const lines = ['ffconcat version 1.0'];
  for (const entry of entries) {
    lines.push(`file '${entry.file}'`, `duration ${entry.durationSeconds}`);
  }
  const last = entries[entries.length - 1];
  if (last) {
    lines.push(`file '${last.file}'`);
  }
  return `${lines.join('\n')}\n`;
}

class FileMaskSession implements MaskSession {
  /** Frame count per written run; the bitmaps themselves are not kept */
  private readonly frameCounts = new Map<number, number>();

  constructor(
    private readonly jobId: string,
    readonly directory: string,
    private readonly width: number,
    private readonly height: number,
    private readonly frameRate: number
  ) {}

  async writeRun(index: number, run: MaskRun): Promise<void> {
    if (!Number.isInteger(index) || index < 0) {
      throw new CropExportError('invalid-input', `Invalid mask index ${index}`);
    }
    const { width, height } = this;
    if (run.mask.pixelWidth !== width || run.mask.pixelHeight !== height) {
      throw new CropExportError('mask-resolution-mismatch', 'Masks in one sequence must share a size', {
        expected: { width, height },
        actual: { width: run.mask.pixelWidth, height: run.mask.pixelHeight },
      });
    }
    await fs.writeFile(path.join(this.directory, maskFileName(index)), encodePgm(run.mask));
    this.frameCounts.set(index, run.frameCount);
  }

  async finish(runCount: number): Promise<WrittenMasks> {
    const input = { width: this.width, height: this.height };
    const entries: Array<{ file: string; durationSeconds: number }> = [];
    for (let index = 0; index < runCount; index++) {
      const frameCount = this.frameCounts.get(index);
      if (frameCount === undefined) {
        throw new CropExportError('invalid-input', `Mask ${index} of ${runCount} was never written`);
      }
      entries.push({ file: maskFileName(index), durationSeconds: frameCount / this.frameRate });
    }
    if (entries.length === 0) {
      throw new CropExportError('invalid-input', 'No masks to write');
    }

    if (entries.length === 1) {
      log.debug(`Wrote still mask for job ${this.jobId}`);
      return {
        path: path.join(this.directory, maskFileName(0)),
        directory: this.directory,
        input: { kind: 'still', ...input },
        fileCount: 1,
      };
    }

    const scriptPath = path.join(this.directory, CONCAT_SCRIPT_NAME);
    await fs.writeFile(scriptPath, buildConcatScript(entries), 'utf8');
    log.debug(`Wrote ${entries.length} masks for job ${this.jobId}`);
    return {
      path: scriptPath,
      directory: this.directory,
      input: { kind: 'sequence', ...input },
      fileCount: entries.length,
    };
  }

  async discard(): Promise<void> {
    await fs.rm(this.directory, { recursive: true, force: true });
  }
}

/**
 * Writes masks as PGM files into a private temp directory per job.
 */
export class FileMaskStore implements MaskWriter {
  constructor(private readonly rootDir: string) {}

  async open(jobId: string, size: { width: number; height: number }, frameRate: number): Promise<MaskSession> {
    if (!(frameRate > 0)) {
      throw new CropExportError('invalid-input', `Invalid mask frame rate ${frameRate}`);
    }
    await fs.mkdir(this.rootDir, { recursive: true });
    const directory = await fs.mkdtemp(path.join(this.rootDir, `crop-masks-${jobId}-`));
    return new FileMaskSession(jobId, directory, size.width, size.height, frameRate);
  }

  async release(masks: WrittenMasks): Promise<void> {
    await fs.rm(masks.directory, { recursive: true, force: true });
    log.debug(`Removed ${masks.directory}`);
  }
}
