import test from 'node:test';
import assert from 'node:assert/strict';

import { evaluateSceneAt, lastFrameOf, summarizeEntities } from '../src/recording/query.js';
import { Recording } from '../src/recording/recording.js';
import { atFrame } from '../src/recording/types.js';

const mesh = { vertices: [0, 0, 0, 1, 0, 0, 0, 1, 0], indices: [0, 1, 2] };

const buildRecording = () => {
  const recording = new Recording('test');
  recording.logViewCoordinates('world', '-Y');
  recording.logMesh('world/phase_a/#0', atFrame(0), mesh);
  recording.logCleared('world/phase_a/#0', atFrame(1));
  recording.logMesh('world/phase_a/#0', atFrame(2), mesh);
  recording.logRigidTransform('world/camera', atFrame(0), [0, 0, 0], [0, 0, 0, 1]);
  recording.logRigidTransform('world/camera', atFrame(2), [0, 0, 2], [0, 0, 0, 1]);
  return recording;
};

const paths = (frame: number) =>
  evaluateSceneAt(buildRecording().entries(), frame).entities.map((entity) => entity.path);

test('a clear removes the entity until it is logged again', () => {
  assert.deepEqual(paths(0), ['world', 'world/camera', 'world/phase_a/#0']);
  assert.deepEqual(paths(1), ['world', 'world/camera']);
  assert.deepEqual(paths(2), ['world', 'world/camera', 'world/phase_a/#0']);
});

test('latest-at keeps the most recent component of each kind', () => {
  const scene = evaluateSceneAt(buildRecording().entries(), 5);
  const camera = scene.entities.find((entity) => entity.path === 'world/camera');
  assert.ok(camera);
  assert.equal(camera.components.length, 1);
  const [pose] = camera.components;
  assert.equal(pose.kind, 'transform');
  if (pose.kind !== 'transform') return;
  assert.deepEqual(pose.translation, [0, 0, 2]);
  assert.equal(scene.frame, 5);
  assert.equal(scene.timeline, 'input_frame_id');
});

test('timeless entries are visible at every frame', () => {
  const scene = evaluateSceneAt(buildRecording().entries(), 0);
  assert.deepEqual(scene.entities[0], {
    path: 'world',
    components: [{ kind: 'view-coordinates', path: 'world', time: null, up: '-Y' }],
  });
});

test('summaries count components per entity and report the last frame', () => {
  const entries = buildRecording().entries();
  assert.equal(lastFrameOf(entries), 2);
  assert.equal(lastFrameOf(entries, 'other'), -1);
  assert.deepEqual(summarizeEntities(entries), [
    { path: 'world', counts: { 'view-coordinates': 1 } },
    { path: 'world/camera', counts: { transform: 2 } },
    { path: 'world/phase_a/#0', counts: { mesh: 2, clear: 1 } },
  ]);
});
