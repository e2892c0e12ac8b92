import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  ConfigValidationError,
  loadRunConfig,
  runConfigPath,
  validateRunConfig,
} from '../src/config/runConfig.js';
import { createDefaultRenderOptions, isRenderView } from '../src/config/renderOptions.js';

test('relative asset paths resolve against the run directory', () => {
  const { config, issues } = validateRunConfig(
    { datasetPath: 'data/dataset.json', bodyModelPath: '/assets/body.json', batchSize: 8 },
    '/runs/seq-a',
    '1',
  );
  assert.deepEqual(config, {
    datasetPath: '/runs/seq-a/data/dataset.json',
    bodyModelPath: '/assets/body.json',
    batchSize: 8,
    deviceId: '1',
  });
  assert.deepEqual(issues, []);
});

test('unknown keys are warnings, bad values are errors', () => {
  const { config, issues } = validateRunConfig(
    { datasetPath: 'd.json', bodyModelPath: 'b.json', learningRate: 0.1 },
    '/runs/x',
    '0',
  );
  assert.equal(config.batchSize, null);
  assert.deepEqual(
    issues.map((issue) => [issue.code, issue.severity]),
    [['config/unknown-key', 'warning']],
  );

  assert.throws(
    () => validateRunConfig({ datasetPath: 'd.json', bodyModelPath: 'b.json', batchSize: 0 }, '/r', '0'),
    (error: unknown) =>
      error instanceof ConfigValidationError &&
      error.issues.some((issue) => issue.code === 'config/batch-size'),
  );
  assert.throws(() => validateRunConfig({ bodyModelPath: 'b.json' }, '/r', '0'), /datasetPath/);
  assert.throws(() => validateRunConfig([], '/r', '0'), ConfigValidationError);
});

test('run configs load from the sentinel directory', async () => {
  const runDir = await mkdtemp(join(tmpdir(), 'motionvis-config-'));
  try {
    await assert.rejects(loadRunConfig(runDir, '0'), ConfigValidationError);
    await mkdir(join(runDir, '.run-config'));
    await writeFile(
      runConfigPath(runDir),
      JSON.stringify({ datasetPath: 'dataset.json', bodyModelPath: 'body.json' }),
    );
    const { config } = await loadRunConfig(runDir, '2');
    assert.equal(config.datasetPath, join(runDir, 'dataset.json'));
    assert.equal(config.deviceId, '2');
  } finally {
    await rm(runDir, { recursive: true, force: true });
  }
});

test('render options default to every view with keypoints on', () => {
  const options = createDefaultRenderOptions({ grid: true });
  assert.deepEqual(options.renderViews, ['src_cam', 'front', 'above', 'side']);
  assert.deepEqual(options.phases, ['motion_chunks']);
  assert.equal(options.renderKeypoints, true);
  assert.equal(options.cameraMode, 'shared');
  assert.equal(options.grid, true);
  assert.equal(isRenderView('front'), true);
  assert.equal(isRenderView('back'), false);
});
