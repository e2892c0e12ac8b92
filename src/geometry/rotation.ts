import { Matrix4, Quaternion, Vector3 } from 'three';

import type { QuatTuple, Vec3Tuple } from '../recording/types.js';

/** Row-major 3x3 matrix, nine entries. */
export type Mat3 = ArrayLike<number>;

const scratchMatrix = new Matrix4();
const scratchQuat = new Quaternion();
const scratchAxis = new Vector3();

const assertMat3 = (m: Mat3) => {
  if (m.length !== 9) {
    throw new RangeError(`Rotation matrix must have 9 entries (received ${m.length})`);
  }
};

/**
 * Converts a row-major rotation matrix to a unit quaternion [x, y, z, w] with w >= 0,
 * so equal rotations always produce identical output.
 */
export const matrixToQuaternion = (m: Mat3): QuatTuple => {
  assertMat3(m);
  scratchMatrix.set(m[0], m[1], m[2], 0, m[3], m[4], m[5], 0, m[6], m[7], m[8], 0, 0, 0, 0, 1);
  scratchQuat.setFromRotationMatrix(scratchMatrix).normalize();
  const sign = scratchQuat.w < 0 ? -1 : 1;
  return [
    sign * scratchQuat.x,
    sign * scratchQuat.y,
    sign * scratchQuat.z,
    sign * scratchQuat.w,
  ];
};

/** Axis-angle (rotation vector) to a row-major rotation matrix. */
export const axisAngleToMatrix = (rx: number, ry: number, rz: number): number[] => {
  const angle = Math.hypot(rx, ry, rz);
  if (angle < 1e-12) {
    return [1, 0, 0, 0, 1, 0, 0, 0, 1];
  }
  scratchAxis.set(rx / angle, ry / angle, rz / angle);
  scratchMatrix.makeRotationAxis(scratchAxis, angle);
  // Matrix4.elements is column-major.
  const e = scratchMatrix.elements;
  return [e[0], e[4], e[8], e[1], e[5], e[9], e[2], e[6], e[10]];
};

export const applyMat3 = (m: Mat3, v: Vec3Tuple): Vec3Tuple => [
  m[0] * v[0] + m[1] * v[1] + m[2] * v[2],
  m[3] * v[0] + m[4] * v[1] + m[5] * v[2],
  m[6] * v[0] + m[7] * v[1] + m[8] * v[2],
];

/** Euclidean norm of a quaternion. */
export const quaternionNorm = (q: QuatTuple): number => Math.hypot(q[0], q[1], q[2], q[3]);
