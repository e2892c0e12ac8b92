import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import { decideVisibility, VISIBILITY, visibilityAt } from '../src/visibility/gate.js';

test('visible and occluded tracks render, out-of-frame tracks clear', () => {
  assert.equal(decideVisibility(VISIBILITY.VISIBLE), 'render');
  assert.equal(decideVisibility(VISIBILITY.OCCLUDED), 'render');
  assert.equal(decideVisibility(VISIBILITY.OUT_OF_FRAME), 'clear');
});

test('the decision depends only on the sign of the code', () => {
  fc.assert(
    fc.property(fc.integer({ min: -1000, max: 1000 }), (code) => {
      assert.equal(decideVisibility(code), code >= 0 ? 'render' : 'clear');
    }),
  );
});

test('mask lookups are track-major and bounds checked', () => {
  const mask = [
    [1, -1, 0],
    [-1, 1, 1],
  ];
  assert.equal(visibilityAt(mask, 0, 1), -1);
  assert.equal(visibilityAt(mask, 1, 2), 1);
  assert.throws(() => visibilityAt(mask, 2, 0), RangeError);
  assert.throws(() => visibilityAt(mask, 0, 3), RangeError);
});
