import type { CameraStream } from '../camera/trajectory.js';
import {
  isRecord,
  outerLength,
  pushIssue,
  readTensor,
  type IssuePath,
  type ValidationIssue,
} from '../validation/issues.js';
import type { PoseParameters } from './types.js';

const innerDims = (value: unknown, depth: number): number | null => {
  let node = value;
  for (let i = 0; i < depth; i++) {
    if (!Array.isArray(node) || node.length === 0) return null;
    node = node[0];
  }
  return outerLength(node);
};

/**
 * Reads `{ trans, rootOrient, poseBody, betas? }` shaped [tracks][frames][...] (betas
 * [tracks][dims]). Returns null after recording issues when any block is malformed.
 */
export const readPoseParameters = (
  block: Record<string, unknown>,
  trackCount: number,
  frameCount: number,
  issues: ValidationIssue[],
  path: IssuePath,
): PoseParameters | null => {
  const trans = readTensor(block.trans, [trackCount, frameCount, 3], issues, [...path, 'trans'], 'pose/trans');
  const rootOrient = readTensor(
    block.rootOrient,
    [trackCount, frameCount, 3],
    issues,
    [...path, 'rootOrient'],
    'pose/root-orient',
  );
  const poseDims = innerDims(block.poseBody, 2) ?? 0;
  if (poseDims === 0 || poseDims % 3 !== 0) {
    pushIssue(issues, 'pose/pose-body', 'poseBody needs a multiple of 3 angles per frame', [
      ...path,
      'poseBody',
    ]);
  }
  const poseBody = readTensor(
    block.poseBody,
    [trackCount, frameCount, poseDims],
    issues,
    [...path, 'poseBody'],
    'pose/pose-body',
  );

  let betas: Float64Array | null = null;
  let betaDims = 0;
  if (block.betas !== undefined && block.betas !== null) {
    betaDims = innerDims(block.betas, 1) ?? 0;
    betas = readTensor(block.betas, [trackCount, betaDims], issues, [...path, 'betas'], 'pose/betas');
  }

  if (!trans || !rootOrient || !poseBody || poseDims % 3 !== 0) {
    return null;
  }
  return { trackCount, frameCount, trans, rootOrient, poseBody, poseDims, betas, betaDims };
};

/** Reads `camR` [frames][3][3] and `camT` [frames][3] from a result block. */
export const readCameraStream = (
  block: Record<string, unknown>,
  frameCount: number,
  issues: ValidationIssue[],
  path: IssuePath,
): CameraStream | null => {
  const rotations = readTensor(block.camR, [frameCount, 3, 3], issues, [...path, 'camR'], 'camera/rotation');
  const translations = readTensor(block.camT, [frameCount, 3], issues, [...path, 'camT'], 'camera/translation');
  if (!rotations || !translations) {
    return null;
  }
  return { frameCount, rotations, translations };
};

export const readResultBlock = (
  value: unknown,
  trackCount: number,
  frameCount: number,
  issues: ValidationIssue[],
  path: IssuePath,
) => {
  if (!isRecord(value)) {
    pushIssue(issues, 'result/type', 'Result block must be an object', path);
    return null;
  }
  const pose = readPoseParameters(value, trackCount, frameCount, issues, path);
  const camera = readCameraStream(value, frameCount, issues, path);
  return pose && camera ? { ...pose, camera } : null;
};
