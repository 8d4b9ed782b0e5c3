import { existsSync } from 'fs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CropExportError } from '../../src/lib/errors.js';
import {
  aiGeometry,
  circleGeometry,
  freehandGeometry,
  rectangleGeometry,
} from '../../src/features/keyframes/utils/geometry.js';
import { buildEncoderArgs } from '../../src/features/export/utils/filter-serializer.js';
import { decodePgm } from '../../src/features/masks/utils/pgm.js';
import type { CropTimeline } from '../../src/types/crop.js';
import { DEFAULT_EXPORT_SETTINGS, type RenderedMask, type SourceVideoProperties } from '../../src/types/export.js';
import type { ExportJobStatus, ExportRequest } from '../types.js';
import { FakeEncoder, FakeProber } from '../test/fakes.js';
import { ExportOrchestrator, type OrchestratorOptions } from './export-orchestrator.js';
import { FileMaskStore } from './mask-store.js';
import { JobManager } from './job-manager.js';

const hd: SourceVideoProperties = { width: 1920, height: 1080, frameRate: 30, codec: 'h264', durationSeconds: 2 };
const small: SourceVideoProperties = { width: 320, height: 240, frameRate: 2, codec: 'h264', durationSeconds: 2 };
const untimed: SourceVideoProperties = { width: 320, height: 240, frameRate: 2, codec: 'h264' };

const staticRect: CropTimeline = {
  mode: 'rectangle',
  keyframes: [
    {
      id: 'r1',
      timestamp: 0,
      geometry: rectangleGeometry({ x: 0.1, y: 0.1, width: 0.5, height: 0.5 }),
      easing: 'linear',
    },
  ],
};

const growingCircle: CropTimeline = {
  mode: 'circle',
  keyframes: [
    { id: 'c1', timestamp: 0, geometry: circleGeometry({ x: 0.5, y: 0.5 }, 0.2), easing: 'linear' },
    { id: 'c2', timestamp: 2, geometry: circleGeometry({ x: 0.5, y: 0.5 }, 0.4), easing: 'linear' },
  ],
};

const fixedCircle: CropTimeline = {
  mode: 'circle',
  keyframes: [{ id: 'c1', timestamp: 0, geometry: circleGeometry({ x: 0.5, y: 0.5 }, 0.2), easing: 'linear' }],
};

const twoPointFreehand: CropTimeline = {
  mode: 'freehand',
  keyframes: [
    {
      id: 'f1',
      timestamp: 0,
      geometry: freehandGeometry([{ x: 0.1, y: 0.1 }, { x: 0.9, y: 0.9 }]),
      easing: 'linear',
    },
  ],
};

function request(overrides: Partial<ExportRequest> = {}): ExportRequest {
  return {
    sourcePath: '/videos/source.mp4',
    outputPath: '/videos/out.mp4',
    timeline: staticRect,
    settings: { ...DEFAULT_EXPORT_SETTINGS },
    ...overrides,
  };
}

describe('ExportOrchestrator', () => {
  let maskRoot: string;
  let jobs: JobManager;
  let encoder: FakeEncoder;
  let prober: FakeProber;

  function createOrchestrator(options: Partial<OrchestratorOptions> = {}): ExportOrchestrator {
    return new ExportOrchestrator({
      jobs,
      prober,
      encoder,
      masks: new FileMaskStore(maskRoot),
      concurrency: 2,
      maskWorkers: 2,
      ...options,
    });
  }

  /** Distinct statuses a job passes through, in order */
  function trackStatuses(jobId: string): ExportJobStatus[] {
    const statuses: ExportJobStatus[] = [];
    jobs.subscribe(jobId, (job) => {
      if (statuses[statuses.length - 1] !== job.status) statuses.push(job.status);
    });
    return statuses;
  }

  beforeEach(async () => {
    maskRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-test-'));
    jobs = new JobManager();
    encoder = new FakeEncoder();
    prober = new FakeProber(hd);
  });

  afterEach(async () => {
    await fs.rm(maskRoot, { recursive: true, force: true });
  });

  it('crops a static rectangle without a mask', async () => {
    const orchestrator = createOrchestrator();
    const statuses = trackStatuses('rect');

    const { jobId, done } = orchestrator.enqueue(request({ jobId: 'rect' }));
    const outcome = await done;

    expect(jobId).toBe('rect');
    expect(outcome.status).toBe('completed');
    expect(outcome.job.progress).toBe(1);
    expect(statuses).toEqual(['validating', 'graph-building', 'encoding', 'completed']);
    expect(prober.calls).toEqual(['/videos/source.mp4']);

    const call = encoder.calls[0];
    expect(call?.invocation.maskPath).toBeUndefined();
    expect(call?.durationSeconds).toBe(2);
    expect(call?.spec.stages).toEqual([
      { name: 'crop', input: '0:v', output: 'cropped', rect: { x: 192, y: 108, width: 960, height: 540 } },
    ]);
    expect(call?.spec.output).toEqual({ width: 960, height: 540 });
    expect(call?.spec.encoder.encoder).toBe('libx264');
  });

  it('writes a mask sequence for an animated circle and removes it afterwards', async () => {
    prober = new FakeProber(small);
    const orchestrator = createOrchestrator();
    const statuses = trackStatuses('circle');

    const outcome = await orchestrator.enqueue(request({ jobId: 'circle', timeline: growingCircle })).done;
    await orchestrator.whenIdle();

    expect(outcome.status).toBe('completed');
    expect(outcome.job.maskCount).toBe(4);
    expect(statuses).toEqual(['validating', 'mask-preparation', 'graph-building', 'encoding', 'completed']);

    const call = encoder.calls[0];
    expect(call?.spec.inputs[1]).toEqual({
      index: 1,
      role: 'mask',
      mask: { kind: 'sequence', width: 320, height: 240 },
    });
    const snapshot = encoder.maskSnapshots[0];
    expect(snapshot?.existed).toBe(true);
    expect(snapshot?.script).toBe(
      [
        'ffconcat version 1.0',
        "file 'mask-00000.pgm'",
        'duration 0.5',
        "file 'mask-00001.pgm'",
        'duration 0.5',
        "file 'mask-00002.pgm'",
        'duration 0.5',
        "file 'mask-00003.pgm'",
        'duration 0.5',
        "file 'mask-00003.pgm'",
        '',
      ].join('\n')
    );
    expect(existsSync(path.dirname(snapshot?.path ?? maskRoot))).toBe(false);
    expect(await fs.readdir(maskRoot)).toEqual([]);
  });

  it('keeps mask files when asked to', async () => {
    prober = new FakeProber(small);
    const orchestrator = createOrchestrator({ keepMasks: true });

    await orchestrator.enqueue(request({ timeline: growingCircle })).done;
    await orchestrator.whenIdle();

    const snapshot = encoder.maskSnapshots[0];
    expect(snapshot?.path).toBeDefined();
    expect(existsSync(snapshot?.path ?? '')).toBe(true);
  });

  it('passes the source through for a degenerate freehand polygon', async () => {
    const orchestrator = createOrchestrator();
    const statuses = trackStatuses('freehand');

    const outcome = await orchestrator.enqueue(request({ jobId: 'freehand', timeline: twoPointFreehand })).done;

    expect(outcome.status).toBe('completed');
    expect(statuses).not.toContain('mask-preparation');
    expect(encoder.calls[0]?.spec.stages).toEqual([]);
    expect(encoder.calls[0]?.spec.outputLabel).toBe('0:v');
  });

  it('skips probing when the source is supplied', async () => {
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.enqueue(request({ source: hd })).done;

    expect(outcome.status).toBe('completed');
    expect(prober.calls).toEqual([]);
  });

  it('reads the duration from the file when the supplied source has none', async () => {
    prober = new FakeProber(small);
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.enqueue(request({ source: untimed })).done;

    expect(outcome.status).toBe('completed');
    expect(prober.calls).toEqual(['/videos/source.mp4']);
    expect(encoder.calls[0]?.invocation.durationSeconds).toBe(2);
  });

  it('lets a still mask run to the end of a source of unknown duration', async () => {
    prober = new FakeProber(untimed);
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.enqueue(request({ timeline: fixedCircle })).done;

    expect(outcome.status).toBe('completed');
    const call = encoder.calls[0];
    expect(call?.spec.inputs[1]).toEqual({ index: 1, role: 'mask', mask: { kind: 'still', width: 320, height: 240 } });
    expect(call?.invocation.durationSeconds).toBeUndefined();
    expect(call?.durationSeconds).toBe(0);

    const args = call ? buildEncoderArgs(call.spec, call.invocation) : [];
    expect(args).not.toContain('-t');
    expect(args[args.indexOf('-filter_complex') + 1]).toContain('[src][mask]alphamerge=shortest=1[');
  });

  it('plans an animated mask through the last keyframe when the duration is unknown', async () => {
    prober = new FakeProber(untimed);
    const orchestrator = createOrchestrator();
    const outcome = await orchestrator.enqueue(request({ timeline: growingCircle })).done;

    expect(outcome.status).toBe('completed');
    expect(outcome.job.maskCount).toBe(5);
    const call = encoder.calls[0];
    expect(call?.invocation.durationSeconds).toBeUndefined();
    expect(call ? buildEncoderArgs(call.spec, call.invocation) : ['-t']).not.toContain('-t');
  });

  it('crops AI masks made at an odd source size to the even frame', async () => {
    prober = new FakeProber({ ...small, width: 321, height: 241 });
    const tracked: RenderedMask = { pixelWidth: 321, pixelHeight: 241, bytes: new Uint8Array(321 * 241).fill(255) };
    const orchestrator = createOrchestrator({ keepMasks: true });
    const timeline: CropTimeline = {
      mode: 'ai',
      keyframes: [
        { id: 'a1', timestamp: 0, geometry: aiGeometry({ x: 0, y: 0, width: 1, height: 1 }, 'ai-0'), easing: 'hold' },
      ],
    };

    const outcome = await orchestrator
      .enqueue(request({ timeline, resolveAiMask: (maskRef) => (maskRef === 'ai-0' ? tracked : undefined) }))
      .done;

    expect(outcome.status).toBe('completed');
    const snapshot = encoder.maskSnapshots[0];
    const written = decodePgm(new Uint8Array(await fs.readFile(snapshot?.path ?? '')));
    expect(written.pixelWidth).toBe(320);
    expect(written.pixelHeight).toBe(240);
  });

  it('reports progress that never decreases', async () => {
    encoder.behave('/videos/out.mp4', { kind: 'succeed', progress: [0.25, 0.5, 0.2, 0.9] });
    const orchestrator = createOrchestrator();
    const seen: number[] = [];
    let last = 0;
    jobs.subscribe('progress', (job) => {
      if (job.progress !== last) {
        seen.push(job.progress);
        last = job.progress;
      }
    });

    await orchestrator.enqueue(request({ jobId: 'progress' })).done;
    expect(seen).toEqual([0.25, 0.5, 0.9, 1]);
  });

  it('cancels a running encode and cleans up its masks', async () => {
    prober = new FakeProber(small);
    encoder.behave('/videos/out.mp4', { kind: 'hang' });
    const orchestrator = createOrchestrator();

    const { jobId, done } = orchestrator.enqueue(request({ timeline: growingCircle }));
    await encoder.waitForCalls(1);
    expect(jobs.getJob(jobId)?.status).toBe('encoding');

    expect(orchestrator.cancel(jobId)).toBe(true);
    const outcome = await done;
    await orchestrator.whenIdle();

    expect(outcome.status).toBe('cancelled');
    expect(jobs.getJob(jobId)?.status).toBe('cancelled');
    expect(encoder.maskSnapshots[0]?.existed).toBe(true);
    expect(await fs.readdir(maskRoot)).toEqual([]);
    expect(orchestrator.cancel(jobId)).toBe(false);
  });

  it('cancels a queued job before it starts', async () => {
    encoder.behave('/videos/first.mp4', { kind: 'hang' });
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const first = orchestrator.enqueue(request({ outputPath: '/videos/first.mp4' }));
    const second = orchestrator.enqueue(request({ outputPath: '/videos/second.mp4' }));
    await encoder.waitForCalls(1);

    expect(jobs.getJob(second.jobId)?.status).toBe('idle');
    expect(orchestrator.cancel(second.jobId)).toBe(true);
    expect((await second.done).status).toBe('cancelled');

    orchestrator.cancel(first.jobId);
    expect((await first.done).status).toBe('cancelled');
    await orchestrator.whenIdle();
    expect(encoder.calls.map((call) => call.invocation.outputPath)).toEqual(['/videos/first.mp4']);
  });

  it('starts jobs in FIFO order within the concurrency limit', async () => {
    encoder.behave('/videos/1.mp4', { kind: 'hang' });
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const first = orchestrator.enqueue(request({ outputPath: '/videos/1.mp4' }));
    orchestrator.enqueue(request({ outputPath: '/videos/2.mp4' }));
    orchestrator.enqueue(request({ outputPath: '/videos/3.mp4' }));
    await encoder.waitForCalls(1);

    expect(orchestrator.runningCount).toBe(1);
    expect(orchestrator.queuedCount).toBe(2);

    orchestrator.cancel(first.jobId);
    await orchestrator.whenIdle();
    expect(encoder.calls.map((call) => call.invocation.outputPath)).toEqual([
      '/videos/1.mp4',
      '/videos/2.mp4',
      '/videos/3.mp4',
    ]);
  });

  it('isolates a failing job from its neighbours', async () => {
    encoder.behave('/videos/bad.mp4', { kind: 'fail', exitCode: 1, stderr: 'Conversion failed!' });
    const orchestrator = createOrchestrator();

    const bad = orchestrator.enqueue(request({ outputPath: '/videos/bad.mp4' }));
    const good = orchestrator.enqueue(request({ outputPath: '/videos/good.mp4' }));
    const [badOutcome, goodOutcome] = await Promise.all([bad.done, good.done]);

    expect(goodOutcome.status).toBe('completed');
    expect(badOutcome).toMatchObject({
      status: 'failed',
      error: {
        type: 'encoder-process-failure',
        message: 'Encoder exited with code 1',
        exitCode: 1,
        diagnostics: 'Conversion failed!',
      },
    });
    expect(jobs.getJob(bad.jobId)?.error?.type).toBe('encoder-process-failure');
  });

  it('fails alpha exports on codecs without alpha before encoding', async () => {
    prober = new FakeProber(small);
    const orchestrator = createOrchestrator();
    const statuses = trackStatuses('alpha');

    const outcome = await orchestrator.enqueue(
      request({
        jobId: 'alpha',
        timeline: growingCircle,
        settings: { ...DEFAULT_EXPORT_SETTINGS, enableAlpha: true, codecHint: 'h264' },
      })
    ).done;

    expect(outcome.status).toBe('failed');
    expect(outcome.job.error?.type).toBe('unsupported-codec');
    expect(statuses).toEqual(['validating', 'mask-preparation', 'failed']);
    expect(encoder.calls).toHaveLength(0);
    expect(await fs.readdir(maskRoot)).toEqual([]);
  });

  it('rejects keyframes past the probed duration', async () => {
    const orchestrator = createOrchestrator();
    const late: CropTimeline = {
      mode: 'rectangle',
      keyframes: [
        {
          id: 'late',
          timestamp: 5,
          geometry: rectangleGeometry({ x: 0.1, y: 0.1, width: 0.5, height: 0.5 }),
          easing: 'linear',
        },
      ],
    };

    const outcome = await orchestrator.enqueue(request({ timeline: late })).done;
    expect(outcome.status).toBe('failed');
    expect(outcome.job.error?.type).toBe('invalid-keyframe');
    expect(encoder.calls).toHaveLength(0);
  });

  it('throws structural problems from enqueue without creating a job', () => {
    const orchestrator = createOrchestrator();

    expect(() => orchestrator.enqueue(request({ outputPath: '/videos/source.mp4' }))).toThrow(CropExportError);
    expect(() =>
      orchestrator.enqueue(
        request({ timeline: { mode: 'rectangle', keyframes: [...staticRect.keyframes, ...staticRect.keyframes] } })
      )
    ).toThrow('Keyframes must be sorted by timestamp with no duplicates');
    expect(() =>
      orchestrator.enqueue(request({ settings: { ...DEFAULT_EXPORT_SETTINGS, backgroundColor: 'red' } }))
    ).toThrow(CropExportError);
    expect(jobs.getAllJobs()).toEqual([]);
  });

  it('cancels everything on shutdown', async () => {
    encoder.behave('/videos/1.mp4', { kind: 'hang' });
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const running = orchestrator.enqueue(request({ outputPath: '/videos/1.mp4' }));
    const queued = orchestrator.enqueue(request({ outputPath: '/videos/2.mp4' }));
    await encoder.waitForCalls(1);
    await orchestrator.shutdown();

    expect((await running.done).status).toBe('cancelled');
    expect((await queued.done).status).toBe('cancelled');
    expect(orchestrator.runningCount).toBe(0);
  });
});
