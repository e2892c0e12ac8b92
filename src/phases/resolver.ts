import { stat } from 'node:fs/promises';
import { join } from 'node:path';

import type { DatasetAdapter } from '../dataset/types.js';
import { formatIssues, isRecord, type ValidationIssue } from '../validation/issues.js';
import { readResultBlock } from './poseSchema.js';
import { latestIteration, type SnapshotStore } from './snapshotStore.js';
import { SnapshotError, type PhaseResolution } from './types.js';

/** Phase built from the dataset's own estimates instead of a snapshot. */
export const INPUT_PHASE = 'input';
export const INPUT_ITERATION = '000000';
/** Result block read out of each snapshot. */
export const WORLD_BLOCK = 'world';

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

export class PhaseResolver {
  private readonly dataset: DatasetAdapter;
  private readonly store: SnapshotStore;

  constructor(dataset: DatasetAdapter, store: SnapshotStore) {
    this.dataset = dataset;
    this.store = store;
  }

  async resolve(phase: string, logDir: string): Promise<PhaseResolution> {
    if (phase === INPUT_PHASE) {
      return this.resolveInput();
    }
    const phaseDir = join(logDir, phase);
    if (!(await isDirectory(phaseDir))) {
      return { kind: 'not-found', phase, reason: `${phaseDir} does not exist` };
    }

    const iterations = await this.store.listIterations(phaseDir);
    const iteration = latestIteration(iterations.keys());
    const source = iteration === undefined ? undefined : iterations.get(iteration);
    if (iteration === undefined || source === undefined) {
      throw new SnapshotError(`Phase directory ${phaseDir} holds no result snapshots`, phaseDir);
    }

    const document = await this.store.load(source);
    if (!isRecord(document)) {
      throw new SnapshotError(`Snapshot ${source} must be a JSON object`, source);
    }
    const issues: ValidationIssue[] = [];
    const result = readResultBlock(
      document[WORLD_BLOCK],
      this.dataset.trackIds.length,
      this.dataset.seqLen,
      issues,
      [WORLD_BLOCK],
    );
    if (!result) {
      throw new SnapshotError(`Snapshot ${source} is malformed: ${formatIssues(issues)}`, source);
    }
    return { kind: 'found', phase, iteration, result, source };
  }

  private resolveInput(): PhaseResolution {
    const estimates = this.dataset.initialEstimates;
    if (!estimates) {
      return { kind: 'not-found', phase: INPUT_PHASE, reason: 'dataset carries no initial estimates' };
    }
    return {
      kind: 'found',
      phase: INPUT_PHASE,
      iteration: INPUT_ITERATION,
      result: { ...estimates, camera: this.dataset.camera },
      source: null,
    };
  }
}
