import test from 'node:test';
import assert from 'node:assert/strict';

import { Recording } from '../src/recording/recording.js';
import {
  assertConvention,
  BODY25_CONVENTION,
  requiredRawJoints,
  type KeypointConvention,
} from '../src/skeleton/conventions.js';
import { extractSkeletonSegments, logTrackSkeleton, skeletonPath } from '../src/skeleton/extract.js';

/** Raw joint i sits at (i, 100 + i); `confidence` picks each joint's confidence. */
const rawFrame = (confidence: (joint: number) => number, joints = 25): Float64Array => {
  const frame = new Float64Array(joints * 3);
  for (let joint = 0; joint < joints; joint++) {
    frame[joint * 3] = joint;
    frame[joint * 3 + 1] = 100 + joint;
    frame[joint * 3 + 2] = confidence(joint);
  }
  return frame;
};

/** Only the nose (raw 0) and left eye (raw 16) carry confidence `c`. */
const noseAndEye = (c: number) => rawFrame((joint) => (joint === 0 || joint === 16 ? c : 0));

test('confident frames produce every canonical segment', () => {
  const result = extractSkeletonSegments(rawFrame(() => 0.9), BODY25_CONVENTION);
  assert.equal(result.kind, 'segments');
  if (result.kind !== 'segments') return;
  assert.equal(result.segmentCount, 19);
  // First edge joins canonical 15 (raw 14) and 13 (raw 13).
  assert.deepEqual(Array.from(result.points.subarray(0, 4)), [14, 114, 13, 113]);
});

test('a segment at exactly the threshold is dropped', () => {
  assert.deepEqual(extractSkeletonSegments(noseAndEye(0.3), BODY25_CONVENTION), { kind: 'clear' });
});

test('a segment just above the threshold is kept', () => {
  const result = extractSkeletonSegments(noseAndEye(0.30001), BODY25_CONVENTION);
  assert.equal(result.kind, 'segments');
  if (result.kind !== 'segments') return;
  assert.equal(result.segmentCount, 1);
  assert.deepEqual(Array.from(result.points), [0, 100, 16, 116]);
});

test('segment confidence is the lower endpoint confidence', () => {
  const frame = rawFrame((joint) => (joint === 0 ? 0.95 : joint === 16 ? 0.2 : 0));
  assert.deepEqual(extractSkeletonSegments(frame, BODY25_CONVENTION), { kind: 'clear' });
});

test('frames missing remapped joints are rejected', () => {
  assert.equal(requiredRawJoints(BODY25_CONVENTION), 19);
  assert.throws(() => extractSkeletonSegments(rawFrame(() => 1, 18), BODY25_CONVENTION), RangeError);
});

test('each frame logs segments or an explicit clear', () => {
  const recording = new Recording('test');
  const data = new Float64Array(2 * 25 * 3);
  data.set(rawFrame(() => 0.9), 0);
  data.set(rawFrame(() => 0.1), 25 * 3);
  const stats = logTrackSkeleton(recording, 3, { data, frameCount: 2, jointCount: 25 }, BODY25_CONVENTION);

  assert.deepEqual(stats, { segmentFrames: 1, clearedFrames: 1 });
  const entries = recording.entries();
  assert.deepEqual(
    entries.map((entry) => [entry.kind, entry.path, entry.time?.frame]),
    [
      ['line-segments', 'world/camera/image/skeleton/#3', 0],
      ['clear', 'world/camera/image/skeleton/#3', 1],
    ],
  );
  assert.equal(skeletonPath(3), 'world/camera/image/skeleton/#3');
});

test('convention tables are range checked', () => {
  assert.doesNotThrow(() => assertConvention(BODY25_CONVENTION));
  const broken: KeypointConvention = { ...BODY25_CONVENTION, id: 'broken', edges: [[0, 17]] };
  assert.throws(() => assertConvention(broken), /out-of-range edge \[0, 17\]/);
});
