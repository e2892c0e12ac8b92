import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';

import type { DefiningCamera } from '../camera/trajectory.js';
import { readCameraStream, readPoseParameters } from '../phases/poseSchema.js';
import type { PoseParameters } from '../phases/types.js';
import type { TrackKeypoints } from '../skeleton/extract.js';
import {
  asFiniteNumber,
  asString,
  formatIssues,
  hasErrors,
  isRecord,
  outerLength,
  pushIssue,
  readTensor,
  ValidationError,
  type ValidationIssue,
} from '../validation/issues.js';
import type { DatasetAdapter } from './types.js';

export class DatasetValidationError extends ValidationError {
  constructor(message: string, issues: ValidationIssue[]) {
    super(message, issues);
    this.name = 'DatasetValidationError';
  }
}

const readVisibility = (
  value: unknown,
  trackCount: number,
  seqLen: number,
  issues: ValidationIssue[],
): number[][] => {
  const flat = readTensor(value, [trackCount, seqLen], issues, ['visMask'], 'dataset/vis-mask');
  if (!flat) return [];
  const rows: number[][] = [];
  for (let track = 0; track < trackCount; track++) {
    const row = Array.from(flat.subarray(track * seqLen, (track + 1) * seqLen));
    const bad = row.find((code) => code !== -1 && code !== 0 && code !== 1);
    if (bad !== undefined) {
      pushIssue(issues, 'dataset/vis-mask', `Visibility code ${bad} is not -1, 0 or 1`, ['visMask', track]);
    }
    rows.push(row);
  }
  return rows;
};

const readJoints = (
  value: unknown,
  trackCount: number,
  seqLen: number,
  issues: ValidationIssue[],
): TrackKeypoints[] => {
  const tracks = Array.isArray(value) ? value : [];
  const firstTrack: unknown = tracks[0];
  const firstFrame: unknown = Array.isArray(firstTrack) ? firstTrack[0] : undefined;
  const jointCount = outerLength(firstFrame) ?? 0;
  const flat = readTensor(value, [trackCount, seqLen, jointCount, 3], issues, ['joints2d'], 'dataset/joints2d');
  if (!flat) return [];
  const stride = seqLen * jointCount * 3;
  return Array.from({ length: trackCount }, (_, track) => ({
    data: flat.slice(track * stride, (track + 1) * stride),
    frameCount: seqLen,
    jointCount,
  }));
};

const readDefiningCamera = (
  value: unknown,
  seqLen: number,
  imageSize: readonly [number, number],
  issues: ValidationIssue[],
): DefiningCamera | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'dataset/camera', 'camera must be an object', ['camera']);
    return null;
  }
  const stream = readCameraStream(value, seqLen, issues, ['camera']);
  const intrinsics = readTensor(value.intrins, [seqLen, 4], issues, ['camera', 'intrins'], 'dataset/intrinsics');
  if (!stream || !intrinsics) return null;
  return { ...stream, intrinsics, imageSize };
};

/**
 * Validates a dataset document. Relative image paths resolve against `baseDir`.
 */
export const parseDataset = (payload: unknown, baseDir: string): DatasetAdapter => {
  const issues: ValidationIssue[] = [];
  if (!isRecord(payload)) {
    pushIssue(issues, 'dataset/type', 'Dataset root must be an object', []);
    throw new DatasetValidationError('Dataset root must be an object', issues);
  }

  const seqLen = asFiniteNumber(payload.seqLen);
  if (seqLen === null || !Number.isInteger(seqLen) || seqLen < 0) {
    pushIssue(issues, 'dataset/seq-len', 'seqLen must be a non-negative integer', ['seqLen']);
    throw new DatasetValidationError(`Dataset is invalid: ${formatIssues(issues)}`, issues);
  }

  const trackIds = Array.isArray(payload.trackIds)
    ? payload.trackIds.map((id: unknown, index: number) => {
        if (typeof id === 'string' || typeof id === 'number') return String(id);
        pushIssue(issues, 'dataset/track-ids', 'Track ids must be strings or numbers', ['trackIds', index]);
        return '';
      })
    : [];
  if (!Array.isArray(payload.trackIds)) {
    pushIssue(issues, 'dataset/track-ids', 'trackIds must be an array', ['trackIds']);
  }

  const size = readTensor(payload.imgSize, [2], issues, ['imgSize'], 'dataset/img-size');
  const imageSize: readonly [number, number] = size ? [size[0], size[1]] : [0, 0];

  const imagePaths = Array.isArray(payload.imagePaths)
    ? payload.imagePaths.map((entry: unknown, index: number) => {
        const text = asString(entry);
        if (text === null) {
          pushIssue(issues, 'dataset/image-paths', 'Image paths must be strings', ['imagePaths', index]);
          return '';
        }
        return isAbsolute(text) ? text : resolve(baseDir, text);
      })
    : [];
  if (imagePaths.length !== seqLen) {
    pushIssue(issues, 'dataset/image-paths', `Expected ${seqLen} image paths`, ['imagePaths']);
  }

  const trackCount = trackIds.length;
  const visibility = readVisibility(payload.visMask, trackCount, seqLen, issues);
  const joints2d = readJoints(payload.joints2d, trackCount, seqLen, issues);
  const camera = readDefiningCamera(payload.camera, seqLen, imageSize, issues);

  let initialEstimates: PoseParameters | null = null;
  if (isRecord(payload.initialEstimates)) {
    initialEstimates = readPoseParameters(
      payload.initialEstimates,
      trackCount,
      seqLen,
      issues,
      ['initialEstimates'],
    );
  }

  if (hasErrors(issues) || !camera) {
    throw new DatasetValidationError(`Dataset is invalid: ${formatIssues(issues)}`, issues);
  }

  return {
    seqLen,
    imageSize,
    trackIds,
    visibility,
    joints2d,
    imagePaths,
    camera,
    initialEstimates,
  };
};

export const loadFileDataset = async (datasetPath: string): Promise<DatasetAdapter> => {
  const text = await readFile(datasetPath, 'utf8');
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetValidationError(`Dataset ${datasetPath} is not valid JSON: ${message}`, []);
  }
  return parseDataset(payload, dirname(datasetPath));
};
