import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { loadTemplateBodyModel } from '../bodyModel/templateModel.js';
import type { BodyModelEvaluator } from '../bodyModel/types.js';
import { CAMERA_IMAGE_PATH, CAMERA_PATH, logCameraTrajectory } from '../camera/trajectory.js';
import { RECORDING_FILENAME, type RenderOptions } from '../config/renderOptions.js';
import { loadRunConfig, type RunConfig } from '../config/runConfig.js';
import { loadFileDataset } from '../dataset/fileDataset.js';
import type { DatasetAdapter } from '../dataset/types.js';
import { emptyBounds, expandBounds, isEmptyBounds, type Bounds3 } from '../geometry/mesh.js';
import { intrinsicMatrix } from '../geometry/projection.js';
import { computeViewpoints, groundGridSegments } from '../geometry/viewpoints.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { logPhaseMeshes, phaseRoot } from '../mesh/producer.js';
import { PhaseResolver } from '../phases/resolver.js';
import { FileSnapshotStore, type SnapshotStore } from '../phases/snapshotStore.js';
import { evaluateSceneAt } from '../recording/query.js';
import { Recording } from '../recording/recording.js';
import { atFrame } from '../recording/types.js';
import { writeCanonicalJson } from '../serialization/canonicalJson.js';
import { assertConvention } from '../skeleton/conventions.js';
import { logTrackSkeleton } from '../skeleton/extract.js';

export const APPLICATION_ID = 'motionvis';
export const WORLD_PATH = 'world';
export const VIEWS_ROOT = 'world/views';
export const SOURCE_VIEW_PATH = `${VIEWS_ROOT}/src_cam`;
export const GROUND_PATH = 'world/ground';

export type RunDependencies = {
  readonly snapshotStore: SnapshotStore;
  readonly loadDataset: (datasetPath: string) => Promise<DatasetAdapter>;
  readonly loadBodyModel: (assetPath: string, capacity: number) => Promise<BodyModelEvaluator>;
  readonly logger: Logger;
};

export const createDefaultDependencies = (logger: Logger = createLogger('render')): RunDependencies => ({
  snapshotStore: new FileSnapshotStore(),
  loadDataset: loadFileDataset,
  loadBodyModel: loadTemplateBodyModel,
  logger,
});

export type PhaseSummary =
  | {
      phase: string;
      status: 'rendered';
      iteration: string;
      geometryEvents: number;
      clearEvents: number;
    }
  | { phase: string; status: 'skipped'; reason: string };

export type SceneBuild = {
  recording: Recording;
  phases: PhaseSummary[];
  bounds: Bounds3;
};

export type RunRequest = {
  readonly logDir: string;
  readonly outputDir: string;
  readonly deviceId: string;
  readonly options: RenderOptions;
};

export type RunOutcome =
  | {
      status: 'rendered';
      logDir: string;
      recordingPath: string;
      hash: string;
      entries: number;
      phases: PhaseSummary[];
      framesWritten: number;
    }
  | { status: 'skipped'; logDir: string; reason: string };

export const cameraPathFor = (phase: string, options: RenderOptions): string =>
  options.cameraMode === 'per-phase' ? `${phaseRoot(phase)}/camera` : CAMERA_PATH;

const logInputFrames = (recording: Recording, dataset: DatasetAdapter) => {
  dataset.imagePaths.forEach((imagePath, frame) => {
    recording.logImageFile(CAMERA_IMAGE_PATH, atFrame(frame), imagePath);
  });
};

const logVirtualViews = (
  recording: Recording,
  dataset: DatasetAdapter,
  bounds: Bounds3,
  options: RenderOptions,
) => {
  const [width, height] = dataset.imageSize;
  const focal = Math.max(width, height);
  for (const viewpoint of computeViewpoints(bounds, options.renderViews)) {
    const path = `${VIEWS_ROOT}/${viewpoint.view}`;
    recording.logRigidTransform(path, null, viewpoint.translation, viewpoint.quaternion);
    recording.logPinhole(`${path}/image`, null, {
      width,
      height,
      intrinsics: intrinsicMatrix({ fx: focal, fy: focal, cx: width / 2, cy: height / 2 }),
    });
  }
};

/**
 * Body-model capacity for one batched phase evaluation (tracks * frames items).
 * `batchSize` can only raise it.
 */
export const bodyModelCapacity = (config: RunConfig, dataset: DatasetAdapter, logger: Logger): number => {
  const required = dataset.trackIds.length * dataset.seqLen;
  if (config.batchSize !== null && config.batchSize < required) {
    logger.warn(
      `batchSize ${config.batchSize} is below the ${required} items of one phase evaluation, using ${required}`,
    );
    return required;
  }
  return config.batchSize ?? required;
};

/**
 * Assembles the full recording of one run. Steps run strictly in order: world
 * convention, input frames, skeletons, defining camera, then each phase.
 */
export const buildSceneRecording = async (
  dataset: DatasetAdapter,
  logDir: string,
  config: RunConfig,
  options: RenderOptions,
  deps: RunDependencies,
): Promise<SceneBuild> => {
  if (options.renderKeypoints) {
    assertConvention(options.convention);
  }
  const recording = new Recording(APPLICATION_ID);
  recording.logViewCoordinates(WORLD_PATH, '-Y');

  logInputFrames(recording, dataset);
  if (options.renderKeypoints) {
    dataset.joints2d.forEach((keypoints, trackIndex) => {
      logTrackSkeleton(recording, trackIndex, keypoints, options.convention);
    });
  }
  logCameraTrajectory(recording, dataset.camera);
  if (options.renderViews.includes('src_cam')) {
    logCameraTrajectory(recording, dataset.camera, SOURCE_VIEW_PATH);
  }

  const resolver = new PhaseResolver(dataset, deps.snapshotStore);
  const phases: PhaseSummary[] = [];
  const bounds = emptyBounds();
  let bodyModel: BodyModelEvaluator | null = null;

  for (const phase of options.phases) {
    const resolution = await resolver.resolve(phase, logDir);
    if (resolution.kind === 'not-found') {
      deps.logger.warn(`${resolution.reason}, skipping phase "${phase}"`, { logDir });
      phases.push({ phase, status: 'skipped', reason: resolution.reason });
      continue;
    }
    bodyModel ??= await deps.loadBodyModel(
      config.bodyModelPath,
      bodyModelCapacity(config, dataset, deps.logger),
    );
    const stats = logPhaseMeshes(recording, phase, resolution.result, dataset.visibility, bodyModel, {
      cameraPath: cameraPathFor(phase, options),
      accumulate: options.accumulate,
      layerCamera: options.renderLayers ? dataset.camera : null,
    });
    if (!isEmptyBounds(stats.bounds)) {
      expandBounds(bounds, [...stats.bounds.min, ...stats.bounds.max]);
    }
    deps.logger.info(`phase "${phase}" logged`, {
      iteration: resolution.iteration,
      meshes: stats.geometryEvents,
      cleared: stats.clearEvents,
    });
    phases.push({
      phase,
      status: 'rendered',
      iteration: resolution.iteration,
      geometryEvents: stats.geometryEvents,
      clearEvents: stats.clearEvents,
    });
  }

  logVirtualViews(recording, dataset, bounds, options);
  if (options.grid) {
    recording.logLineSegments(GROUND_PATH, null, groundGridSegments(bounds), 3);
  }
  return { recording, phases, bounds };
};

const exists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

/** One canonical JSON scene snapshot per frame under `<outputDir>/frames`. */
export const writeFrameSnapshots = async (
  recording: Recording,
  frameCount: number,
  outputDir: string,
): Promise<number> => {
  const framesDir = join(outputDir, 'frames');
  await mkdir(framesDir, { recursive: true });
  const entries = recording.entries();
  for (let frame = 0; frame < frameCount; frame++) {
    const state = evaluateSceneAt(entries, frame);
    await writeFile(
      join(framesDir, `${String(frame).padStart(6, '0')}.json`),
      writeCanonicalJson(state),
      'utf8',
    );
  }
  return frameCount;
};

export const renderRun = async (request: RunRequest, deps: RunDependencies): Promise<RunOutcome> => {
  const { logDir, outputDir, deviceId, options } = request;
  const recordingPath = join(outputDir, RECORDING_FILENAME);
  if (!options.overwrite && (await exists(recordingPath))) {
    const reason = `${recordingPath} already exists`;
    deps.logger.warn(`${reason}, skipping (use --overwrite to replace it)`);
    return { status: 'skipped', logDir, reason };
  }

  const { config, issues } = await loadRunConfig(logDir, deviceId);
  for (const issue of issues) {
    deps.logger.warn(issue.message, { code: issue.code });
  }
  const dataset = await deps.loadDataset(config.datasetPath);
  if (dataset.trackIds.length < 1) {
    deps.logger.warn('No tracks in dataset, skipping', { logDir });
    return { status: 'skipped', logDir, reason: 'No tracks in dataset' };
  }

  const { recording, phases } = await buildSceneRecording(dataset, logDir, config, options, deps);
  const persisted = await recording.persist(recordingPath);
  deps.logger.info(`recording saved to ${persisted.path}`, {
    entries: persisted.entries,
    hash: persisted.hash,
  });
  const framesWritten = options.saveFrames
    ? await writeFrameSnapshots(recording, dataset.seqLen, outputDir)
    : 0;
  return {
    status: 'rendered',
    logDir,
    recordingPath: persisted.path,
    hash: persisted.hash,
    entries: persisted.entries,
    phases,
    framesWritten,
  };
};
