import test from 'node:test';
import assert from 'node:assert/strict';

import { emptyBounds, expandBounds } from '../src/geometry/mesh.js';
import { applyMat3 } from '../src/geometry/rotation.js';
import {
  boundsCenter,
  boundsRadius,
  computeViewpoints,
  groundGridSegments,
} from '../src/geometry/viewpoints.js';

const assertClose = (actual: ArrayLike<number>, expected: number[], tolerance = 1e-9) => {
  assert.equal(actual.length, expected.length);
  expected.forEach((value, i) => {
    assert.ok(Math.abs(actual[i] - value) <= tolerance, `index ${i}: ${actual[i]} vs ${value}`);
  });
};

const cube = () => expandBounds(emptyBounds(), [-1, -1, -1, 1, 1, 1]);

test('the source camera is not a virtual view', () => {
  const views = computeViewpoints(emptyBounds(), ['src_cam', 'front']);
  assert.deepEqual(
    views.map((view) => view.view),
    ['front'],
  );
});

test('the front view looks along +z at the scene centre', () => {
  const [front] = computeViewpoints(emptyBounds(), ['front']);
  assertClose(front.position, [0, 0, -2.5]);
  assertClose(front.rotation, [1, 0, 0, 0, 1, 0, 0, 0, 1]);
  assertClose(front.translation, [0, 0, 2.5]);
  assertClose(front.quaternion, [0, 0, 0, 1]);
});

test('the above view looks down world +y from above', () => {
  const [above] = computeViewpoints(emptyBounds(), ['above']);
  assertClose(above.position, [0, -2.5, 0]);
  assertClose(above.rotation, [-1, 0, 0, 0, 0, 1, 0, 1, 0]);
});

test('every view keeps the scene centre on its optical axis', () => {
  const bounds = cube();
  const distance = 2.5 * boundsRadius(bounds);
  const center = boundsCenter(bounds);
  for (const view of computeViewpoints(bounds, ['front', 'above', 'side'])) {
    const [x, y, z] = applyMat3(view.rotation, [center.x, center.y, center.z]);
    assertClose([x + view.translation[0], y + view.translation[1], z + view.translation[2]], [0, 0, distance]);
  }
  assert.ok(Math.abs(boundsRadius(bounds) - Math.sqrt(3)) < 1e-12);
  assert.equal(boundsRadius(emptyBounds()), 1);
});

test('the ground grid lies in the floor plane below the bodies', () => {
  const empty = groundGridSegments(emptyBounds());
  assert.equal(empty.length, 2 * 11 * 6);
  assert.deepEqual(Array.from(empty.subarray(0, 6)), [-2, 0, -2, -2, 0, 2]);

  const bounds = expandBounds(emptyBounds(), [0, -1, 0, 1, 1.5, 1]);
  const grid = groundGridSegments(bounds, 4);
  assert.equal(grid.length, 2 * 5 * 6);
  for (let i = 1; i < grid.length; i += 3) {
    assert.equal(grid[i], 1.5);
  }
});
