import type { DefiningCamera } from '../camera/trajectory.js';
import type { PoseParameters } from '../phases/types.js';
import type { TrackKeypoints } from '../skeleton/extract.js';
import type { VisibilityMask } from '../visibility/gate.js';

export interface DatasetAdapter {
  readonly seqLen: number;
  readonly imageSize: readonly [number, number];
  readonly trackIds: readonly string[];
  readonly visibility: VisibilityMask;
  readonly joints2d: readonly TrackKeypoints[];
  /** One image file per frame. */
  readonly imagePaths: readonly string[];
  readonly camera: DefiningCamera;
  /** Initial per-track estimates the optimisation starts from, when the dataset has them. */
  readonly initialEstimates: PoseParameters | null;
}
