import type { Recording } from '../recording/recording.js';
import { atFrame } from '../recording/types.js';
import { requiredRawJoints, type KeypointConvention } from './conventions.js';

/** Values per keypoint: x, y, confidence. */
export const KEYPOINT_STRIDE = 3;

export type SkeletonFrame =
  | { kind: 'segments'; segmentCount: number; points: Float32Array }
  | { kind: 'clear' };

/**
 * Builds the confident line segments of one frame. `rawFrame` holds the detector's
 * keypoints as [x, y, c] triples in the convention's raw order. A segment survives when
 * the lower of its endpoint confidences is strictly above the convention threshold.
 */
export const extractSkeletonSegments = (
  rawFrame: ArrayLike<number>,
  convention: KeypointConvention,
): SkeletonFrame => {
  const rawJoints = Math.floor(rawFrame.length / KEYPOINT_STRIDE);
  const needed = requiredRawJoints(convention);
  if (rawJoints < needed) {
    throw new RangeError(
      `Keypoint frame has ${rawJoints} joints; convention ${convention.id} needs ${needed}`,
    );
  }

  const points: number[] = [];
  for (const [a, b] of convention.edges) {
    const rawA = convention.remap[a] * KEYPOINT_STRIDE;
    const rawB = convention.remap[b] * KEYPOINT_STRIDE;
    const confidence = Math.min(rawFrame[rawA + 2], rawFrame[rawB + 2]);
    if (!(confidence > convention.minConfidence)) continue;
    points.push(rawFrame[rawA], rawFrame[rawA + 1], rawFrame[rawB], rawFrame[rawB + 1]);
  }

  if (points.length === 0) {
    return { kind: 'clear' };
  }
  return { kind: 'segments', segmentCount: points.length / 4, points: Float32Array.from(points) };
};

export const skeletonPath = (trackIndex: number) => `world/camera/image/skeleton/#${trackIndex}`;

export type TrackKeypoints = {
  /** Flat [frame][joint][x, y, c]. */
  readonly data: Float64Array;
  readonly frameCount: number;
  readonly jointCount: number;
};

export const keypointFrame = (track: TrackKeypoints, frame: number): Float64Array => {
  const stride = track.jointCount * KEYPOINT_STRIDE;
  return track.data.subarray(frame * stride, (frame + 1) * stride);
};

/**
 * Logs one track's overlay for every frame: segments, or an explicit clear so a viewer
 * never keeps showing a stale skeleton.
 */
export const logTrackSkeleton = (
  recording: Recording,
  trackIndex: number,
  keypoints: TrackKeypoints,
  convention: KeypointConvention,
): { segmentFrames: number; clearedFrames: number } => {
  const path = skeletonPath(trackIndex);
  let segmentFrames = 0;
  let clearedFrames = 0;
  for (let frame = 0; frame < keypoints.frameCount; frame++) {
    const skeleton = extractSkeletonSegments(keypointFrame(keypoints, frame), convention);
    if (skeleton.kind === 'segments') {
      recording.logLineSegments(path, atFrame(frame), skeleton.points);
      segmentFrames++;
    } else {
      recording.logCleared(path, atFrame(frame));
      clearedFrames++;
    }
  }
  return { segmentFrames, clearedFrames };
};
