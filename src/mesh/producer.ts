import type { BodyModelEvaluator, BodyModelOutput } from '../bodyModel/types.js';
import {
  intrinsicsAt,
  logCameraPose,
  rotationAt,
  translationAt,
  type DefiningCamera,
} from '../camera/trajectory.js';
import { computeVertexNormals, emptyBounds, expandBounds, type Bounds3 } from '../geometry/mesh.js';
import { projectPoints } from '../geometry/projection.js';
import { toBodyModelBatch, type PhaseResult } from '../phases/types.js';
import type { Recording } from '../recording/recording.js';
import { atFrame } from '../recording/types.js';
import { decideVisibility, visibilityAt, type VisibilityMask } from '../visibility/gate.js';

export const phaseRoot = (phase: string) => `world/phase_${phase}`;

export const meshPath = (phase: string, trackIndex: number, frame?: number) => {
  const base = `${phaseRoot(phase)}/#${trackIndex}`;
  return frame === undefined ? base : `${base}/frame_${String(frame).padStart(6, '0')}`;
};

export const layerPath = (phase: string, trackIndex: number) =>
  `world/camera/image/layers/phase_${phase}/#${trackIndex}`;

export type MeshProducerOptions = {
  /** Where the phase camera stream goes. */
  cameraPath: string;
  /** Keep every frame's mesh on its own path so earlier frames stay visible. */
  accumulate: boolean;
  /** Intrinsics source for per-track image layers; layers are skipped when absent. */
  layerCamera: DefiningCamera | null;
};

export type MeshProducerStats = {
  geometryEvents: number;
  clearEvents: number;
  vertexCount: number;
  bounds: Bounds3;
};

/** Vertex slice of one (track, frame) item of a batch evaluation. */
export const vertexSlice = (
  output: BodyModelOutput,
  frameCount: number,
  track: number,
  frame: number,
): Float32Array => {
  const stride = output.vertexCount * 3;
  const item = track * frameCount + frame;
  return output.vertices.subarray(item * stride, (item + 1) * stride);
};

/**
 * Logs one phase: a single batched body-model evaluation, then per frame the phase
 * camera pose followed by every track's mesh or clear.
 */
export const logPhaseMeshes = (
  recording: Recording,
  phase: string,
  result: PhaseResult,
  visibility: VisibilityMask,
  bodyModel: BodyModelEvaluator,
  options: MeshProducerOptions,
): MeshProducerStats => {
  const { trackCount, frameCount } = result;
  const output = bodyModel.evaluate(toBodyModelBatch(result));
  const expected = trackCount * frameCount * output.vertexCount * 3;
  if (output.vertices.length !== expected) {
    throw new RangeError(
      `Body model returned ${output.vertices.length} vertex values, expected ${expected}`,
    );
  }

  const stats: MeshProducerStats = {
    geometryEvents: 0,
    clearEvents: 0,
    vertexCount: output.vertexCount,
    bounds: emptyBounds(),
  };

  for (let frame = 0; frame < frameCount; frame++) {
    const time = atFrame(frame);
    logCameraPose(recording, result.camera, frame, options.cameraPath);
    for (let track = 0; track < trackCount; track++) {
      const path = meshPath(phase, track, options.accumulate ? frame : undefined);
      if (decideVisibility(visibilityAt(visibility, track, frame)) === 'clear') {
        recording.logCleared(path, time);
        if (options.layerCamera) {
          recording.logCleared(layerPath(phase, track), time);
        }
        stats.clearEvents++;
        continue;
      }
      const vertices = vertexSlice(output, frameCount, track, frame);
      recording.logMesh(path, time, {
        vertices,
        indices: output.faces,
        normals: computeVertexNormals(vertices, output.faces),
      });
      expandBounds(stats.bounds, vertices);
      stats.geometryEvents++;
      if (options.layerCamera) {
        recording.logPoints2D(
          layerPath(phase, track),
          time,
          projectPoints(
            vertices,
            rotationAt(result.camera, frame),
            translationAt(result.camera, frame),
            intrinsicsAt(options.layerCamera, frame),
          ),
        );
      }
    }
  }
  return stats;
};
