import test from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { DatasetValidationError, loadFileDataset, parseDataset } from '../src/dataset/fileDataset.js';
import { keypointFrame as frameOf } from '../src/skeleton/extract.js';
import { datasetPayload, withTempDir } from './helpers/runFixture.js';

test('datasets expose tracks, visibility, keypoints and the defining camera', () => {
  const dataset = parseDataset(datasetPayload({ visMask: [[1, -1, 0], [-1, 1, 1]] }), '/data/seq');
  assert.equal(dataset.seqLen, 3);
  assert.deepEqual(dataset.trackIds, ['p0', 'p1']);
  assert.deepEqual(dataset.imageSize, [100, 80]);
  assert.deepEqual(dataset.visibility, [
    [1, -1, 0],
    [-1, 1, 1],
  ]);
  assert.equal(dataset.imagePaths[2], '/data/seq/frames/000002.jpg');
  assert.equal(dataset.joints2d.length, 2);
  assert.equal(dataset.joints2d[1].jointCount, 25);
  assert.deepEqual(Array.from(frameOf(dataset.joints2d[1], 2).subarray(0, 6)), [0, 100, 0.9, 1, 101, 0.9]);
  assert.equal(dataset.camera.frameCount, 3);
  assert.deepEqual(Array.from(dataset.camera.translations.subarray(6, 9)), [0, 0, 7]);
  assert.deepEqual(Array.from(dataset.camera.intrinsics.subarray(0, 4)), [100, 100, 50, 40]);
  assert.equal(dataset.initialEstimates, null);
});

test('initial estimates are read when present', () => {
  const dataset = parseDataset(datasetPayload({ visMask: [[1, 1]], withEstimates: true }), '/data');
  assert.ok(dataset.initialEstimates);
  assert.equal(dataset.initialEstimates.poseDims, 3);
  assert.deepEqual(Array.from(dataset.initialEstimates.trans), [0, 0, 0, 0, 0, 1]);
});

test('numeric track ids become strings and an empty dataset is valid', () => {
  const payload = { ...datasetPayload({ visMask: [], seqLen: 2 }), trackIds: [] };
  const empty = parseDataset(payload, '/data');
  assert.deepEqual(empty.trackIds, []);
  assert.equal(empty.seqLen, 2);

  const numbered = parseDataset({ ...datasetPayload({ visMask: [[1]] }), trackIds: [7] }, '/data');
  assert.deepEqual(numbered.trackIds, ['7']);
});

test('invalid visibility codes and shapes are reported with their paths', () => {
  assert.throws(
    () => parseDataset(datasetPayload({ visMask: [[1, 2]] }), '/data'),
    (error: unknown) =>
      error instanceof DatasetValidationError &&
      error.issues.some((issue) => issue.code === 'dataset/vis-mask' && issue.path.join('.') === 'visMask.0'),
  );
  const truncated = { ...datasetPayload({ visMask: [[1, 1]] }), imagePaths: ['only-one.jpg'] };
  assert.throws(() => parseDataset(truncated, '/data'), /Expected 2 image paths/);
});

test('dataset files that are not JSON are rejected', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'dataset.json');
    await writeFile(path, '{ nope');
    await assert.rejects(loadFileDataset(path), DatasetValidationError);
  });
});
