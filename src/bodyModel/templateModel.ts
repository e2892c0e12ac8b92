import { readFile } from 'node:fs/promises';

import { axisAngleToMatrix } from '../geometry/rotation.js';
import {
  formatIssues,
  isRecord,
  outerLength,
  pushIssue,
  readTensor,
  type ValidationIssue,
} from '../validation/issues.js';
import {
  BodyModelError,
  type BodyModelBatch,
  type BodyModelEvaluator,
  type BodyModelOutput,
} from './types.js';

export type TemplateBodyAsset = {
  readonly vertexCount: number;
  readonly template: Float64Array;
  readonly faces: Uint32Array;
  /** vertexCount * 3 * shapeDims, or null without blend shapes. */
  readonly shapeDirs: Float64Array | null;
  readonly shapeDims: number;
  readonly rootJoint: readonly [number, number, number];
};

/**
 * Rigid template body: linear shape blend shapes, then rotation about the root joint
 * and translation. Body joint angles are accepted and not articulated.
 */
export class TemplateBodyModel implements BodyModelEvaluator {
  readonly vertexCount: number;
  readonly capacity: number;
  private readonly asset: TemplateBodyAsset;

  constructor(asset: TemplateBodyAsset, capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new BodyModelError(`Body model capacity must be a positive integer (received ${capacity})`);
    }
    this.asset = asset;
    this.vertexCount = asset.vertexCount;
    this.capacity = capacity;
  }

  evaluate(batch: BodyModelBatch): BodyModelOutput {
    if (batch.size > this.capacity) {
      throw new BodyModelError(
        `Batch of ${batch.size} exceeds body model capacity ${this.capacity}`,
      );
    }
    if (batch.trans.length !== batch.size * 3 || batch.rootOrient.length !== batch.size * 3) {
      throw new BodyModelError('Batch translation/orientation buffers do not match its size');
    }
    const { template, shapeDirs, shapeDims, rootJoint, vertexCount } = this.asset;
    const betaDims = batch.betas ? (batch.betaDims ?? 0) : 0;
    const usedDims = Math.min(betaDims, shapeDirs ? shapeDims : 0);

    const vertices = new Float32Array(batch.size * vertexCount * 3);
    const shaped = new Float64Array(vertexCount * 3);
    for (let item = 0; item < batch.size; item++) {
      shaped.set(template);
      if (shapeDirs && batch.betas && usedDims > 0) {
        for (let v = 0; v < vertexCount * 3; v++) {
          let offset = 0;
          for (let s = 0; s < usedDims; s++) {
            offset += shapeDirs[v * shapeDims + s] * batch.betas[item * betaDims + s];
          }
          shaped[v] += offset;
        }
      }
      const r = axisAngleToMatrix(
        batch.rootOrient[item * 3],
        batch.rootOrient[item * 3 + 1],
        batch.rootOrient[item * 3 + 2],
      );
      const tx = batch.trans[item * 3] + rootJoint[0];
      const ty = batch.trans[item * 3 + 1] + rootJoint[1];
      const tz = batch.trans[item * 3 + 2] + rootJoint[2];
      const base = item * vertexCount * 3;
      for (let v = 0; v < vertexCount; v++) {
        const x = shaped[v * 3] - rootJoint[0];
        const y = shaped[v * 3 + 1] - rootJoint[1];
        const z = shaped[v * 3 + 2] - rootJoint[2];
        vertices[base + v * 3] = r[0] * x + r[1] * y + r[2] * z + tx;
        vertices[base + v * 3 + 1] = r[3] * x + r[4] * y + r[5] * z + ty;
        vertices[base + v * 3 + 2] = r[6] * x + r[7] * y + r[8] * z + tz;
      }
    }
    return { vertexCount, vertices, faces: this.asset.faces };
  }
}

export const parseTemplateBodyAsset = (payload: unknown, sourceName = '<inline>'): TemplateBodyAsset => {
  const issues: ValidationIssue[] = [];
  if (!isRecord(payload)) {
    throw new BodyModelError(`Body model asset ${sourceName} must be a JSON object`);
  }
  const vertexCount = outerLength(payload.vertices) ?? 0;
  const faceCount = outerLength(payload.faces) ?? 0;
  if (vertexCount === 0) {
    pushIssue(issues, 'body-model/vertices', 'Asset needs a non-empty vertices array', ['vertices']);
  }
  if (faceCount === 0) {
    pushIssue(issues, 'body-model/faces', 'Asset needs a non-empty faces array', ['faces']);
  }
  const template = readTensor(payload.vertices, [vertexCount, 3], issues, ['vertices'], 'body-model/vertices');
  const faceValues = readTensor(payload.faces, [faceCount, 3], issues, ['faces'], 'body-model/faces');
  let faces: Uint32Array | null = null;
  if (faceValues) {
    const bad = faceValues.findIndex((index) => !Number.isInteger(index) || index < 0 || index >= vertexCount);
    if (bad >= 0) {
      pushIssue(issues, 'body-model/faces', `Face index ${faceValues[bad]} is out of range`, ['faces']);
    } else {
      faces = Uint32Array.from(faceValues);
    }
  }

  let shapeDirs: Float64Array | null = null;
  let shapeDims = 0;
  if (payload.shapeDirs !== undefined) {
    const first = Array.isArray(payload.shapeDirs) ? payload.shapeDirs[0] : undefined;
    const firstAxis = Array.isArray(first) ? first[0] : undefined;
    shapeDims = outerLength(firstAxis) ?? 0;
    shapeDirs = readTensor(
      payload.shapeDirs,
      [vertexCount, 3, shapeDims],
      issues,
      ['shapeDirs'],
      'body-model/shape-dirs',
    );
  }

  let rootJoint: [number, number, number] = [0, 0, 0];
  if (payload.rootJoint !== undefined) {
    const joint = readTensor(payload.rootJoint, [3], issues, ['rootJoint'], 'body-model/root-joint');
    if (joint) rootJoint = [joint[0], joint[1], joint[2]];
  }

  if (issues.length > 0 || !template || !faces) {
    throw new BodyModelError(`Body model asset ${sourceName} is invalid: ${formatIssues(issues)}`);
  }
  return { vertexCount, template, faces, shapeDirs, shapeDims, rootJoint };
};

export const loadTemplateBodyModel = async (
  assetPath: string,
  capacity: number,
): Promise<TemplateBodyModel> => {
  let payload: unknown;
  try {
    payload = JSON.parse(await readFile(assetPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BodyModelError(`Cannot read body model asset ${assetPath}: ${message}`);
  }
  return new TemplateBodyModel(parseTemplateBodyAsset(payload, assetPath), capacity);
};
