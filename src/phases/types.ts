import type { BodyModelBatch } from '../bodyModel/types.js';
import type { CameraStream } from '../camera/trajectory.js';

/** Pose parameters for every (track, frame), track-major. */
export type PoseParameters = {
  readonly trackCount: number;
  readonly frameCount: number;
  readonly trans: Float64Array;
  readonly rootOrient: Float64Array;
  readonly poseBody: Float64Array;
  readonly poseDims: number;
  /** trackCount * betaDims, constant over frames. */
  readonly betas: Float64Array | null;
  readonly betaDims: number;
};

export type PhaseResult = PoseParameters & {
  readonly camera: CameraStream;
};

export type PhaseResolution =
  | {
      readonly kind: 'found';
      readonly phase: string;
      readonly iteration: string;
      readonly result: PhaseResult;
      /** Snapshot file, or null for phases built from the dataset. */
      readonly source: string | null;
    }
  | { readonly kind: 'not-found'; readonly phase: string; readonly reason: string };

export class SnapshotError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

/** Flattens a phase into one body-model batch; per-track betas are repeated per frame. */
export const toBodyModelBatch = (params: PoseParameters): BodyModelBatch => {
  const size = params.trackCount * params.frameCount;
  if (!params.betas || params.betaDims === 0) {
    return {
      size,
      trans: params.trans,
      rootOrient: params.rootOrient,
      poseBody: params.poseBody,
      poseDims: params.poseDims,
    };
  }
  const betas = new Float64Array(size * params.betaDims);
  for (let track = 0; track < params.trackCount; track++) {
    const row = params.betas.subarray(track * params.betaDims, (track + 1) * params.betaDims);
    for (let frame = 0; frame < params.frameCount; frame++) {
      betas.set(row, (track * params.frameCount + frame) * params.betaDims);
    }
  }
  return {
    size,
    trans: params.trans,
    rootOrient: params.rootOrient,
    poseBody: params.poseBody,
    poseDims: params.poseDims,
    betas,
    betaDims: params.betaDims,
  };
};
