import { Vector3 } from 'three';

import type { RenderView } from '../config/renderOptions.js';
import { isEmptyBounds, type Bounds3 } from './mesh.js';
import { matrixToQuaternion } from './rotation.js';
import type { QuatTuple, Vec3Tuple } from '../recording/types.js';

export type VirtualView = Exclude<RenderView, 'src_cam'>;

export type ViewpointPose = {
  view: VirtualView;
  /** World-to-camera, RDF axes. */
  rotation: number[];
  translation: Vec3Tuple;
  quaternion: QuatTuple;
  position: Vec3Tuple;
};

/** World up is -Y, so image-down is +Y. */
const WORLD_DOWN = new Vector3(0, 1, 0);
const FALLBACK_DOWN = new Vector3(0, 0, 1);

const VIEW_OFFSETS: Record<VirtualView, Vector3> = {
  front: new Vector3(0, 0, -1),
  above: new Vector3(0, -1, 0),
  side: new Vector3(1, 0, 0),
};

export const boundsCenter = (bounds: Bounds3): Vector3 =>
  isEmptyBounds(bounds)
    ? new Vector3(0, 0, 0)
    : new Vector3(
        (bounds.min[0] + bounds.max[0]) / 2,
        (bounds.min[1] + bounds.max[1]) / 2,
        (bounds.min[2] + bounds.max[2]) / 2,
      );

export const boundsRadius = (bounds: Bounds3): number => {
  if (isEmptyBounds(bounds)) return 1;
  const diagonal = Math.hypot(
    bounds.max[0] - bounds.min[0],
    bounds.max[1] - bounds.min[1],
    bounds.max[2] - bounds.min[2],
  );
  return Math.max(1, diagonal / 2);
};

/**
 * Camera at `position` looking at `target`, as a world-to-camera rotation (rows are the
 * camera's right, down and forward axes in world coordinates) and translation.
 */
export const lookAt = (position: Vector3, target: Vector3): { rotation: number[]; translation: Vec3Tuple } => {
  const forward = target.clone().sub(position).normalize();
  let right = new Vector3().crossVectors(WORLD_DOWN, forward);
  if (right.lengthSq() < 1e-12) {
    right = new Vector3().crossVectors(FALLBACK_DOWN, forward);
  }
  right.normalize();
  const down = new Vector3().crossVectors(forward, right).normalize();
  const rotation = [right.x, right.y, right.z, down.x, down.y, down.z, forward.x, forward.y, forward.z];
  const translation: Vec3Tuple = [
    -(right.x * position.x + right.y * position.y + right.z * position.z),
    -(down.x * position.x + down.y * position.y + down.z * position.z),
    -(forward.x * position.x + forward.y * position.y + forward.z * position.z),
  ];
  return { rotation, translation };
};

export const computeViewpoints = (bounds: Bounds3, views: readonly RenderView[]): ViewpointPose[] => {
  const center = boundsCenter(bounds);
  const distance = 2.5 * boundsRadius(bounds);
  return views
    .filter((view): view is VirtualView => view !== 'src_cam')
    .map((view) => {
      const position = VIEW_OFFSETS[view].clone().multiplyScalar(distance).add(center);
      const { rotation, translation } = lookAt(position, center);
      return {
        view,
        rotation,
        translation,
        quaternion: matrixToQuaternion(rotation),
        position: [position.x, position.y, position.z],
      };
    });
};

/**
 * Square grid on the floor (the plane through the lowest point along world up, i.e.
 * the largest y), as 3D segment endpoints.
 */
export const groundGridSegments = (bounds: Bounds3, cells = 10): Float32Array => {
  const center = boundsCenter(bounds);
  const floorY = isEmptyBounds(bounds) ? 0 : bounds.max[1];
  const half = Math.ceil(1.5 * boundsRadius(bounds));
  const step = (2 * half) / cells;
  const points: number[] = [];
  for (let i = 0; i <= cells; i++) {
    const offset = -half + i * step;
    points.push(center.x + offset, floorY, center.z - half, center.x + offset, floorY, center.z + half);
    points.push(center.x - half, floorY, center.z + offset, center.x + half, floorY, center.z + offset);
  }
  return Float32Array.from(points);
};
