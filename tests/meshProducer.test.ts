import test from 'node:test';
import assert from 'node:assert/strict';

import { parseTemplateBodyAsset, TemplateBodyModel } from '../src/bodyModel/templateModel.js';
import type { BodyModelBatch, BodyModelEvaluator, BodyModelOutput } from '../src/bodyModel/types.js';
import type { DefiningCamera } from '../src/camera/trajectory.js';
import { layerPath, logPhaseMeshes, meshPath } from '../src/mesh/producer.js';
import type { PhaseResult } from '../src/phases/types.js';
import { Recording } from '../src/recording/recording.js';
import { TRIANGLE_ASSET } from './helpers/runFixture.js';

const TRACKS = 2;
const FRAMES = 3;
const VISIBILITY = [
  [1, -1, 0],
  [-1, 1, 1],
];

/** Track b, frame f translated to (b, 0, f); camera at z = 10 looking down +z. */
const phaseResult = (): PhaseResult => {
  const trans = new Float64Array(TRACKS * FRAMES * 3);
  for (let track = 0; track < TRACKS; track++) {
    for (let frame = 0; frame < FRAMES; frame++) {
      trans.set([track, 0, frame], (track * FRAMES + frame) * 3);
    }
  }
  const rotations = new Float64Array(FRAMES * 9);
  for (let frame = 0; frame < FRAMES; frame++) {
    rotations.set([1, 0, 0, 0, 1, 0, 0, 0, 1], frame * 9);
  }
  return {
    trackCount: TRACKS,
    frameCount: FRAMES,
    trans,
    rootOrient: new Float64Array(TRACKS * FRAMES * 3),
    poseBody: new Float64Array(TRACKS * FRAMES * 3),
    poseDims: 3,
    betas: null,
    betaDims: 0,
    camera: { frameCount: FRAMES, rotations, translations: Float64Array.of(0, 0, 10, 0, 0, 10, 0, 0, 10) },
  };
};

const layerCamera: DefiningCamera = {
  ...phaseResult().camera,
  intrinsics: Float64Array.of(100, 100, 50, 40, 100, 100, 50, 40, 100, 100, 50, 40),
  imageSize: [100, 80],
};

class CountingModel implements BodyModelEvaluator {
  readonly batches: number[] = [];
  private readonly inner = new TemplateBodyModel(parseTemplateBodyAsset(TRIANGLE_ASSET), TRACKS * FRAMES);
  readonly vertexCount = this.inner.vertexCount;
  readonly capacity = this.inner.capacity;

  evaluate(batch: BodyModelBatch): BodyModelOutput {
    this.batches.push(batch.size);
    return this.inner.evaluate(batch);
  }
}

const options = { cameraPath: 'world/camera', accumulate: false, layerCamera: null };

test('each frame logs the camera pose, then a mesh or clear per track', () => {
  const recording = new Recording('test');
  const model = new CountingModel();
  const stats = logPhaseMeshes(recording, 'fit', phaseResult(), VISIBILITY, model, options);

  assert.deepEqual(model.batches, [6]);
  assert.equal(stats.geometryEvents, 4);
  assert.equal(stats.clearEvents, 2);
  assert.deepEqual(
    recording.entries().map((entry) => `${entry.time?.frame} ${entry.kind} ${entry.path}`),
    [
      '0 transform world/camera',
      '0 mesh world/phase_fit/#0',
      '0 clear world/phase_fit/#1',
      '1 transform world/camera',
      '1 clear world/phase_fit/#0',
      '1 mesh world/phase_fit/#1',
      '2 transform world/camera',
      '2 mesh world/phase_fit/#0',
      '2 mesh world/phase_fit/#1',
    ],
  );
  assert.deepEqual(stats.bounds, { min: [0, 0, 0], max: [2, 1, 2] });
});

test('meshes carry posed vertices, the shared faces and normals', () => {
  const recording = new Recording('test');
  logPhaseMeshes(recording, 'fit', phaseResult(), VISIBILITY, new CountingModel(), options);
  const meshes = recording.entries().flatMap((entry) => (entry.kind === 'mesh' ? [entry] : []));
  const trackOneFrameOne = meshes.find((entry) => entry.path === 'world/phase_fit/#1' && entry.time?.frame === 1);
  assert.ok(trackOneFrameOne);
  assert.deepEqual(Array.from(trackOneFrameOne.vertices), [1, 0, 1, 2, 0, 1, 1, 1, 1]);
  assert.deepEqual(Array.from(trackOneFrameOne.normals ?? []), [0, 0, 1, 0, 0, 1, 0, 0, 1]);
  for (const mesh of meshes) {
    assert.deepEqual(Array.from(mesh.indices), [0, 1, 2]);
  }
});

test('a track that is never visible is cleared on every frame', () => {
  const recording = new Recording('test');
  const hidden = [
    [-1, -1, -1],
    [1, 1, 1],
  ];
  logPhaseMeshes(recording, 'fit', phaseResult(), hidden, new CountingModel(), options);
  const trackZero = recording.entries().filter((entry) => entry.path === meshPath('fit', 0));
  assert.deepEqual(
    trackZero.map((entry) => [entry.kind, entry.time?.frame]),
    [
      ['clear', 0],
      ['clear', 1],
      ['clear', 2],
    ],
  );
});

test('accumulate keeps one path per frame', () => {
  const recording = new Recording('test');
  logPhaseMeshes(recording, 'fit', phaseResult(), VISIBILITY, new CountingModel(), {
    ...options,
    accumulate: true,
  });
  const trackZero = recording
    .entries()
    .filter((entry) => entry.path.startsWith('world/phase_fit/#0/'))
    .map((entry) => `${entry.kind} ${entry.path}`);
  assert.deepEqual(trackZero, [
    'mesh world/phase_fit/#0/frame_000000',
    'clear world/phase_fit/#0/frame_000001',
    'mesh world/phase_fit/#0/frame_000002',
  ]);
});

test('image layers project meshes through the phase camera', () => {
  const recording = new Recording('test');
  logPhaseMeshes(recording, 'fit', phaseResult(), VISIBILITY, new CountingModel(), {
    ...options,
    layerCamera,
  });
  const layer = recording.entries().filter((entry) => entry.path === layerPath('fit', 0));
  assert.deepEqual(
    layer.map((entry) => [entry.kind, entry.time?.frame]),
    [
      ['points2d', 0],
      ['clear', 1],
      ['points2d', 2],
    ],
  );
  const [first] = layer;
  assert.equal(first.kind, 'points2d');
  if (first.kind !== 'points2d') return;
  assert.deepEqual(Array.from(first.positions), [50, 40, 60, 40, 50, 50]);
  assert.equal(layerPath('fit', 0), 'world/camera/image/layers/phase_fit/#0');
});

test('a body model returning the wrong vertex count is fatal', () => {
  const broken: BodyModelEvaluator = {
    vertexCount: 3,
    capacity: 6,
    evaluate: () => ({ vertexCount: 3, vertices: new Float32Array(9), faces: Uint32Array.of(0, 1, 2) }),
  };
  assert.throws(
    () => logPhaseMeshes(new Recording('test'), 'fit', phaseResult(), VISIBILITY, broken, options),
    RangeError,
  );
});
