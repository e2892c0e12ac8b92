import type { Mat3 } from './rotation.js';

export type PinholeIntrinsics = {
  fx: number;
  fy: number;
  cx: number;
  cy: number;
};

export const intrinsicMatrix = ({ fx, fy, cx, cy }: PinholeIntrinsics): number[] => [
  fx, 0, cx,
  0, fy, cy,
  0, 0, 1,
];

/**
 * Projects world points into pixel coordinates with x_cam = R * x_world + t.
 * Points at or behind the image plane (z <= 1e-6) are dropped.
 */
export const projectPoints = (
  points: ArrayLike<number>,
  rotation: Mat3,
  translation: ArrayLike<number>,
  intrinsics: PinholeIntrinsics,
): Float32Array => {
  const out: number[] = [];
  for (let i = 0; i + 2 < points.length; i += 3) {
    const x = points[i];
    const y = points[i + 1];
    const z = points[i + 2];
    const xc = rotation[0] * x + rotation[1] * y + rotation[2] * z + translation[0];
    const yc = rotation[3] * x + rotation[4] * y + rotation[5] * z + translation[1];
    const zc = rotation[6] * x + rotation[7] * y + rotation[8] * z + translation[2];
    if (zc <= 1e-6) continue;
    out.push(intrinsics.fx * (xc / zc) + intrinsics.cx, intrinsics.fy * (yc / zc) + intrinsics.cy);
  }
  return Float32Array.from(out);
};
