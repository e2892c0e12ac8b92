export type JointEdge = readonly [number, number];

/**
 * How raw detector keypoints map onto an anatomical skeleton: `remap[i]` is the raw
 * index feeding canonical joint `i`, `edges` index the canonical order.
 */
export type KeypointConvention = {
  readonly id: string;
  readonly rawJointCount: number;
  readonly remap: readonly number[];
  readonly edges: readonly JointEdge[];
  readonly minConfidence: number;
};

/** BODY_25 detector ordering (nose, neck, limbs, hips, eyes, ears, feet) to 17 canonical joints. */
export const BODY25_TO_CANONICAL17: readonly number[] = [
  0, 16, 15, 18, 17, 5, 2, 6, 3, 7, 4, 12, 9, 13, 10, 14, 11,
];

/** Canonical 17 joints: nose, eyes, ears, shoulders, elbows, wrists, hips, knees, ankles. */
export const CANONICAL17_EDGES: readonly JointEdge[] = [
  [15, 13],
  [13, 11],
  [16, 14],
  [14, 12],
  [11, 12],
  [5, 11],
  [6, 12],
  [5, 6],
  [5, 7],
  [6, 8],
  [7, 9],
  [8, 10],
  [1, 2],
  [0, 1],
  [0, 2],
  [1, 3],
  [2, 4],
  [3, 5],
  [4, 6],
];

export const SKELETON_MIN_CONFIDENCE = 0.3;

export const BODY25_CONVENTION: KeypointConvention = {
  id: 'body25-canonical17',
  rawJointCount: 25,
  remap: BODY25_TO_CANONICAL17,
  edges: CANONICAL17_EDGES,
  minConfidence: SKELETON_MIN_CONFIDENCE,
};

/** Smallest raw keypoint count a frame must carry for this convention. */
export const requiredRawJoints = (convention: KeypointConvention): number =>
  convention.remap.reduce((max, raw) => Math.max(max, raw + 1), 0);

/** Throws when a convention's tables index out of range. */
export const assertConvention = (convention: KeypointConvention): void => {
  const canonicalCount = convention.remap.length;
  const badRemap = convention.remap.find(
    (raw) => !Number.isInteger(raw) || raw < 0 || raw >= convention.rawJointCount,
  );
  if (badRemap !== undefined) {
    throw new RangeError(`Convention ${convention.id} remaps from unknown raw joint ${badRemap}`);
  }
  const badEdge = convention.edges.find(
    ([a, b]) => a < 0 || b < 0 || a >= canonicalCount || b >= canonicalCount,
  );
  if (badEdge) {
    throw new RangeError(`Convention ${convention.id} has out-of-range edge [${badEdge.join(', ')}]`);
  }
};
