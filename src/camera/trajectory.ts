import { intrinsicMatrix, type PinholeIntrinsics } from '../geometry/projection.js';
import { matrixToQuaternion } from '../geometry/rotation.js';
import type { Recording } from '../recording/recording.js';
import { atFrame, type Vec3Tuple } from '../recording/types.js';

export const CAMERA_PATH = 'world/camera';
export const CAMERA_IMAGE_PATH = 'world/camera/image';
/** Axis convention of camera frames: x right, y down, z forward. */
export const CAMERA_XYZ = 'RDF';

/** World-to-camera pose per frame (x_cam = R x_world + t). */
export type CameraStream = {
  readonly frameCount: number;
  /** Row-major 3x3 per frame. */
  readonly rotations: Float64Array;
  readonly translations: Float64Array;
};

export type DefiningCamera = CameraStream & {
  /** fx, fy, cx, cy per frame. */
  readonly intrinsics: Float64Array;
  readonly imageSize: readonly [number, number];
};

export const rotationAt = (stream: CameraStream, frame: number): Float64Array =>
  stream.rotations.subarray(frame * 9, frame * 9 + 9);

export const translationAt = (stream: CameraStream, frame: number): Vec3Tuple => {
  const t = stream.translations;
  return [t[frame * 3], t[frame * 3 + 1], t[frame * 3 + 2]];
};

export const intrinsicsAt = (camera: DefiningCamera, frame: number): PinholeIntrinsics => {
  const k = camera.intrinsics;
  return { fx: k[frame * 4], fy: k[frame * 4 + 1], cx: k[frame * 4 + 2], cy: k[frame * 4 + 3] };
};

/** Rigid pose of one stream frame under `path`. */
export const logCameraPose = (
  recording: Recording,
  stream: CameraStream,
  frame: number,
  path: string = CAMERA_PATH,
): void => {
  recording.logRigidTransform(
    path,
    atFrame(frame),
    translationAt(stream, frame),
    matrixToQuaternion(rotationAt(stream, frame)),
    CAMERA_XYZ,
  );
};

/**
 * Logs pinhole and pose for every frame of the defining camera. The pose goes to
 * `path`, the pinhole to `<path>/image`.
 */
export const logCameraTrajectory = (
  recording: Recording,
  camera: DefiningCamera,
  path: string = CAMERA_PATH,
): number => {
  const [width, height] = camera.imageSize;
  const imagePath = path === CAMERA_PATH ? CAMERA_IMAGE_PATH : `${path}/image`;
  for (let frame = 0; frame < camera.frameCount; frame++) {
    recording.logPinhole(imagePath, atFrame(frame), {
      width,
      height,
      intrinsics: intrinsicMatrix(intrinsicsAt(camera, frame)),
    });
    logCameraPose(recording, camera, frame, path);
  }
  return camera.frameCount;
};
