import { createStore } from 'zustand/vanilla';
import { createLogger } from '@/lib/logger';
import { CropExportError } from '@/lib/errors';
import type { CropMode, CropTimeline } from '@/types/crop';
import type { ExportSettings } from '@/types/export';
import { DEFAULT_EXPORT_SETTINGS } from '@/types/export';
import {
  addKeyframe as addTimelineKeyframe,
  assertValidTimeline,
  createTimeline,
  removeKeyframe as removeTimelineKeyframe,
  setTimelineMode,
  updateKeyframe as updateTimelineKeyframe,
  type KeyframeUpdate,
  type NewKeyframe,
} from '../utils/timeline-operations';

const log = createLogger('CropTimelineStore');

/**
 * Crop state owned by one loaded video.
 */
export interface VideoCropEntry {
  videoId: string;
  timeline: CropTimeline;
  settings: ExportSettings;
  durationSeconds?: number;
}

export interface LoadVideoOptions {
  mode?: CropMode;
  durationSeconds?: number;
  settings?: Partial<ExportSettings>;
  /** Restore a previously saved timeline instead of starting empty */
  timeline?: CropTimeline;
}

interface CropTimelineState {
  videos: Record<string, VideoCropEntry>;
}

interface CropTimelineActions {
  loadVideo: (videoId: string, options?: LoadVideoOptions) => VideoCropEntry;
  unloadVideo: (videoId: string) => boolean;
  setMode: (videoId: string, mode: CropMode) => void;
  /** Returns the id of the inserted keyframe */
  addKeyframe: (videoId: string, keyframe: NewKeyframe) => string;
  updateKeyframe: (videoId: string, keyframeId: string, updates: KeyframeUpdate) => void;
  removeKeyframe: (videoId: string, keyframeId: string) => void;
  setExportSettings: (videoId: string, settings: Partial<ExportSettings>) => void;
  getEntry: (videoId: string) => VideoCropEntry | undefined;
  getTimeline: (videoId: string) => CropTimeline | undefined;
}

export type CropTimelineStore = CropTimelineState & CropTimelineActions;

/**
 * Per-video crop timelines. Every mutation goes through the pure timeline
 * operations, so rejected edits leave the stored timeline untouched.
 *
 * Usage:
 *   const store = createCropTimelineStore();
 *   store.getState().loadVideo('video-1', { mode: 'circle' });
 *   store.getState().addKeyframe('video-1', { timestamp: 0, geometry });
 */
export function createCropTimelineStore() {
  return createStore<CropTimelineStore>()((set, get) => {
    const requireEntry = (videoId: string): VideoCropEntry => {
      const entry = get().videos[videoId];
      if (!entry) {
        throw new CropExportError('invalid-input', `Video ${videoId} is not loaded`);
      }
      return entry;
    };

    const putEntry = (entry: VideoCropEntry): void => {
      set((state) => ({ videos: { ...state.videos, [entry.videoId]: entry } }));
    };

    const limitsOf = (entry: VideoCropEntry) =>
      entry.durationSeconds === undefined ? {} : { durationSeconds: entry.durationSeconds };

    return {
      videos: {},

      loadVideo: (videoId, options = {}) => {
        const timeline = options.timeline ?? createTimeline(options.mode ?? 'rectangle');
        const entry: VideoCropEntry = {
          videoId,
          timeline,
          settings: { ...DEFAULT_EXPORT_SETTINGS, ...options.settings },
          ...(options.durationSeconds === undefined ? {} : { durationSeconds: options.durationSeconds }),
        };
        assertValidTimeline(timeline, limitsOf(entry));
        putEntry(entry);
        log.debug(`Loaded ${videoId} (${timeline.mode}, ${timeline.keyframes.length} keyframes)`);
        return entry;
      },

      unloadVideo: (videoId) => {
        if (!get().videos[videoId]) return false;
        set((state) => {
          const videos = { ...state.videos };
          delete videos[videoId];
          return { videos };
        });
        log.debug(`Unloaded ${videoId}`);
        return true;
      },

      setMode: (videoId, mode) => {
        const entry = requireEntry(videoId);
        if (entry.timeline.mode !== mode && entry.timeline.keyframes.length > 0) {
          log.info(`Mode change on ${videoId} cleared ${entry.timeline.keyframes.length} keyframes`);
        }
        putEntry({ ...entry, timeline: setTimelineMode(entry.timeline, mode) });
      },

      addKeyframe: (videoId, keyframe) => {
        const entry = requireEntry(videoId);
        const timeline = addTimelineKeyframe(entry.timeline, keyframe, limitsOf(entry));
        putEntry({ ...entry, timeline });
        const inserted = timeline.keyframes.find((k) => k.timestamp === keyframe.timestamp);
        return inserted?.id ?? '';
      },

      updateKeyframe: (videoId, keyframeId, updates) => {
        const entry = requireEntry(videoId);
        putEntry({
          ...entry,
          timeline: updateTimelineKeyframe(entry.timeline, keyframeId, updates, limitsOf(entry)),
        });
      },

      removeKeyframe: (videoId, keyframeId) => {
        const entry = requireEntry(videoId);
        putEntry({ ...entry, timeline: removeTimelineKeyframe(entry.timeline, keyframeId) });
      },

      setExportSettings: (videoId, settings) => {
        const entry = requireEntry(videoId);
        putEntry({ ...entry, settings: { ...entry.settings, ...settings } });
      },

      getEntry: (videoId) => get().videos[videoId],

      getTimeline: (videoId) => get().videos[videoId]?.timeline,
    };
  });
}

export type CropTimelineStoreApi = ReturnType<typeof createCropTimelineStore>;
