/**
 * One flattened batch of pose parameters, `size` = tracks * frames, track-major
 * (entry `track * frames + frame`).
 */
export type BodyModelBatch = {
  readonly size: number;
  /** size * 3 global translations. */
  readonly trans: Float64Array;
  /** size * 3 axis-angle root orientations. */
  readonly rootOrient: Float64Array;
  /** size * poseDims axis-angle body joint rotations. */
  readonly poseBody: Float64Array;
  readonly poseDims: number;
  /** size * betaDims shape coefficients, when the phase estimated shape. */
  readonly betas?: Float64Array;
  readonly betaDims?: number;
};

export type BodyModelOutput = {
  readonly vertexCount: number;
  /** size * vertexCount * 3 world-space positions. */
  readonly vertices: Float32Array;
  /** Shared triangle topology, faceCount * 3. */
  readonly faces: Uint32Array;
};

export interface BodyModelEvaluator {
  readonly vertexCount: number;
  /** Largest batch a single evaluate call accepts. */
  readonly capacity: number;
  evaluate(batch: BodyModelBatch): BodyModelOutput;
}

export class BodyModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BodyModelError';
  }
}
