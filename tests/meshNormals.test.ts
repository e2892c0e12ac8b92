import test from 'node:test';
import assert from 'node:assert/strict';

import { computeVertexNormals, emptyBounds, expandBounds, isEmptyBounds } from '../src/geometry/mesh.js';

test('counter-clockwise triangle in the xy plane faces +z', () => {
  const vertices = Float32Array.of(0, 0, 0, 1, 0, 0, 0, 1, 0);
  const normals = computeVertexNormals(vertices, Uint32Array.of(0, 1, 2));
  assert.deepEqual(Array.from(normals), [0, 0, 1, 0, 0, 1, 0, 0, 1]);
});

test('reversed winding flips the normal', () => {
  const vertices = Float32Array.of(0, 0, 0, 1, 0, 0, 0, 1, 0);
  const normals = computeVertexNormals(vertices, Uint32Array.of(0, 2, 1));
  assert.deepEqual(Array.from(normals.subarray(0, 3)), [0, 0, -1]);
});

test('shared vertices average incident faces by area', () => {
  // Vertex 0 is shared by a large +z triangle and a small +x triangle.
  const vertices = Float32Array.of(0, 0, 0, 2, 0, 0, 0, 2, 0, 0, 1, 0, 0, 0, 1);
  const faces = Uint32Array.of(0, 1, 2, 0, 3, 4);
  const normals = computeVertexNormals(vertices, faces);
  const [x, y, z] = normals.subarray(0, 3);
  assert.ok(Math.abs(Math.hypot(x, y, z) - 1) < 1e-6);
  assert.ok(z > x, `large face should dominate: ${x}, ${z}`);
  assert.ok(Math.abs(z / x - 4) < 1e-5);
});

test('normal and vertex buffers must hold whole triples', () => {
  assert.throws(() => computeVertexNormals(Float32Array.of(0, 0), Uint32Array.of(0, 1, 2)), RangeError);
  assert.throws(
    () => computeVertexNormals(Float32Array.of(0, 0, 0, 1, 0, 0, 0, 1, 0), Uint32Array.of(0, 1)),
    RangeError,
  );
});

test('bounds grow to cover every vertex', () => {
  const bounds = emptyBounds();
  assert.equal(isEmptyBounds(bounds), true);
  expandBounds(bounds, [1, -2, 3, -1, 4, 0]);
  assert.equal(isEmptyBounds(bounds), false);
  assert.deepEqual(bounds, { min: [-1, -2, 0], max: [1, 4, 3] });
});
