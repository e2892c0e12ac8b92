import { orderEntries } from './recording.js';
import {
  INPUT_FRAME_TIMELINE,
  type RecordingEntry,
  type RecordingEntryKind,
} from './types.js';

export type EntityState = {
  path: string;
  components: RecordingEntry[];
};

export type SceneState = {
  timeline: string;
  frame: number;
  entities: EntityState[];
};

export type SceneQueryOptions = {
  timeline?: string;
};

const isVisibleAt = (entry: RecordingEntry, timeline: string, frame: number): boolean =>
  entry.time === null || (entry.time.timeline === timeline && entry.time.frame <= frame);

/**
 * Latest-at evaluation: replays entries up to and including `frame` in playback order.
 * Each path keeps its most recent entry per component kind; a clear drops the path.
 */
export const evaluateSceneAt = (
  entries: readonly RecordingEntry[],
  frame: number,
  options: SceneQueryOptions = {},
): SceneState => {
  const timeline = options.timeline ?? INPUT_FRAME_TIMELINE;
  const clampedFrame = Math.max(0, Math.floor(frame));
  const state = new Map<string, Map<RecordingEntryKind, RecordingEntry>>();

  for (const entry of orderEntries(entries)) {
    if (!isVisibleAt(entry, timeline, clampedFrame)) continue;
    if (entry.kind === 'clear') {
      state.delete(entry.path);
      continue;
    }
    const components = state.get(entry.path) ?? new Map<RecordingEntryKind, RecordingEntry>();
    components.set(entry.kind, entry);
    state.set(entry.path, components);
  }

  const entities = [...state.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, components]) => ({ path, components: [...components.values()] }));
  return { timeline, frame: clampedFrame, entities };
};

/** Highest frame index any entry on the timeline is keyed on, or -1 when there is none. */
export const lastFrameOf = (
  entries: readonly RecordingEntry[],
  timeline: string = INPUT_FRAME_TIMELINE,
): number =>
  entries.reduce(
    (max, entry) =>
      entry.time && entry.time.timeline === timeline ? Math.max(max, entry.time.frame) : max,
    -1,
  );

export type EntitySummary = {
  path: string;
  counts: Partial<Record<RecordingEntryKind, number>>;
};

export const summarizeEntities = (entries: readonly RecordingEntry[]): EntitySummary[] => {
  const byPath = new Map<string, Partial<Record<RecordingEntryKind, number>>>();
  for (const entry of entries) {
    const counts = byPath.get(entry.path) ?? {};
    counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    byPath.set(entry.path, counts);
  }
  return [...byPath.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, counts]) => ({ path, counts }));
};
