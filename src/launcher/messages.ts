import {
  createDefaultRenderOptions,
  isRenderView,
  type CameraMode,
  type RenderOptions,
  type RenderView,
} from '../config/renderOptions.js';
import type { RunOutcome } from '../scene/orchestrator.js';
import { asFiniteNumber, asString, isRecord } from '../validation/issues.js';

/** Render options as they cross the process boundary; the keypoint convention stays default. */
export type TaskOptions = Omit<RenderOptions, 'convention'>;

export type RenderTask = {
  readonly index: number;
  readonly logDir: string;
  readonly outputDir: string;
  readonly deviceId: string;
  readonly options: TaskOptions;
};

export type TaskReport =
  | { readonly status: 'rendered'; readonly recordingPath: string; readonly hash: string; readonly entries: number }
  | { readonly status: 'skipped'; readonly reason: string }
  | { readonly status: 'failed'; readonly errorName: string; readonly message: string };

export type WorkerRequest = { readonly kind: 'run'; readonly task: RenderTask };

export type WorkerReply =
  | { readonly kind: 'done'; readonly report: TaskReport }
  | { readonly kind: 'failed'; readonly errorName: string; readonly message: string };

export const toTaskOptions = (options: RenderOptions): TaskOptions => ({
  phases: [...options.phases],
  renderViews: [...options.renderViews],
  grid: options.grid,
  renderLayers: options.renderLayers,
  renderKeypoints: options.renderKeypoints,
  saveFrames: options.saveFrames,
  accumulate: options.accumulate,
  overwrite: options.overwrite,
  cameraMode: options.cameraMode,
});

export const toRenderOptions = (options: TaskOptions): RenderOptions =>
  createDefaultRenderOptions({ ...options });

export const reportFromOutcome = (outcome: RunOutcome): TaskReport =>
  outcome.status === 'rendered'
    ? {
        status: 'rendered',
        recordingPath: outcome.recordingPath,
        hash: outcome.hash,
        entries: outcome.entries,
      }
    : { status: 'skipped', reason: outcome.reason };

export const reportFromError = (error: unknown): TaskReport =>
  error instanceof Error
    ? { status: 'failed', errorName: error.name, message: error.message }
    : { status: 'failed', errorName: 'Error', message: String(error) };

const readStringList = (value: unknown): string[] | null => {
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const item of value) {
    const text = asString(item);
    if (text === null) return null;
    out.push(text);
  }
  return out;
};

const readFlag = (value: unknown): boolean | null => (typeof value === 'boolean' ? value : null);

const readCameraMode = (value: unknown): CameraMode | null =>
  value === 'shared' || value === 'per-phase' ? value : null;

const readTaskOptions = (value: unknown): TaskOptions | null => {
  if (!isRecord(value)) return null;
  const phases = readStringList(value.phases);
  const views = readStringList(value.renderViews);
  const renderViews: RenderView[] = [];
  for (const view of views ?? []) {
    if (!isRenderView(view)) return null;
    renderViews.push(view);
  }
  const grid = readFlag(value.grid);
  const renderLayers = readFlag(value.renderLayers);
  const renderKeypoints = readFlag(value.renderKeypoints);
  const saveFrames = readFlag(value.saveFrames);
  const accumulate = readFlag(value.accumulate);
  const overwrite = readFlag(value.overwrite);
  const cameraMode = readCameraMode(value.cameraMode);
  if (
    phases === null ||
    views === null ||
    grid === null ||
    renderLayers === null ||
    renderKeypoints === null ||
    saveFrames === null ||
    accumulate === null ||
    overwrite === null ||
    cameraMode === null
  ) {
    return null;
  }
  return {
    phases,
    renderViews,
    grid,
    renderLayers,
    renderKeypoints,
    saveFrames,
    accumulate,
    overwrite,
    cameraMode,
  };
};

/** Narrows a message received by a worker; null when it is not a run request. */
export const readWorkerRequest = (value: unknown): WorkerRequest | null => {
  if (!isRecord(value) || value.kind !== 'run' || !isRecord(value.task)) return null;
  const { task } = value;
  const index = asFiniteNumber(task.index);
  const logDir = asString(task.logDir);
  const outputDir = asString(task.outputDir);
  const deviceId = asString(task.deviceId);
  const options = readTaskOptions(task.options);
  if (index === null || logDir === null || outputDir === null || deviceId === null || options === null) {
    return null;
  }
  return { kind: 'run', task: { index, logDir, outputDir, deviceId, options } };
};

const readTaskReport = (value: unknown): TaskReport | null => {
  if (!isRecord(value)) return null;
  if (value.status === 'rendered') {
    const recordingPath = asString(value.recordingPath);
    const hash = asString(value.hash);
    const entries = asFiniteNumber(value.entries);
    return recordingPath === null || hash === null || entries === null
      ? null
      : { status: 'rendered', recordingPath, hash, entries };
  }
  if (value.status === 'skipped') {
    const reason = asString(value.reason);
    return reason === null ? null : { status: 'skipped', reason };
  }
  return null;
};

/** Narrows a message received from a worker; null when it is not a reply. */
export const readWorkerReply = (value: unknown): WorkerReply | null => {
  if (!isRecord(value)) return null;
  if (value.kind === 'done') {
    const report = readTaskReport(value.report);
    return report === null ? null : { kind: 'done', report };
  }
  if (value.kind === 'failed') {
    const errorName = asString(value.errorName) ?? 'Error';
    const message = asString(value.message) ?? 'worker failed';
    return { kind: 'failed', errorName, message };
  }
  return null;
};
