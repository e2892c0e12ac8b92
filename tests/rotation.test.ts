import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { Quaternion, Vector3 } from 'three';

import {
  applyMat3,
  axisAngleToMatrix,
  matrixToQuaternion,
  quaternionNorm,
} from '../src/geometry/rotation.js';

const assertClose = (actual: ArrayLike<number>, expected: ArrayLike<number>, tolerance = 1e-9) => {
  assert.equal(actual.length, expected.length);
  for (let i = 0; i < expected.length; i++) {
    assert.ok(
      Math.abs(actual[i] - expected[i]) <= tolerance,
      `index ${i}: ${actual[i]} is not within ${tolerance} of ${expected[i]}`,
    );
  }
};

test('identity rotation maps to the identity quaternion', () => {
  assert.deepEqual(matrixToQuaternion([1, 0, 0, 0, 1, 0, 0, 0, 1]), [0, 0, 0, 1]);
});

test('half turn about x gives a pure x quaternion', () => {
  assertClose(matrixToQuaternion([1, 0, 0, 0, -1, 0, 0, 0, -1]), [1, 0, 0, 0]);
});

test('quarter turn about z round-trips through axis-angle', () => {
  const m = axisAngleToMatrix(0, 0, Math.PI / 2);
  assertClose(m, [0, -1, 0, 1, 0, 0, 0, 0, 1]);
  assertClose(applyMat3(m, [1, 0, 0]), [0, 1, 0]);
  assertClose(matrixToQuaternion(m), [0, 0, Math.SQRT1_2, Math.SQRT1_2]);
});

test('a zero rotation vector yields the identity matrix', () => {
  assert.deepEqual(axisAngleToMatrix(0, 0, 0), [1, 0, 0, 0, 1, 0, 0, 0, 1]);
});

test('matrices without nine entries are rejected', () => {
  assert.throws(() => matrixToQuaternion([1, 0, 0, 0, 1, 0, 0, 0]), RangeError);
});

test('quaternions are unit length, have w >= 0 and match the axis-angle rotation', () => {
  const component = fc.double({ min: -1, max: 1, noNaN: true });
  fc.assert(
    fc.property(
      component,
      component,
      component,
      fc.double({ min: 0.01, max: Math.PI - 0.01, noNaN: true }),
      (ax, ay, az, angle) => {
        const axis = new Vector3(ax, ay, az);
        fc.pre(axis.length() > 0.1);
        axis.normalize();
        const m = axisAngleToMatrix(axis.x * angle, axis.y * angle, axis.z * angle);
        const q = matrixToQuaternion(m);
        assert.ok(Math.abs(quaternionNorm(q) - 1) < 1e-9);
        assert.ok(q[3] >= 0);
        const expected = new Quaternion().setFromAxisAngle(axis, angle);
        assertClose(q, [expected.x, expected.y, expected.z, expected.w], 1e-6);
      },
    ),
  );
});
