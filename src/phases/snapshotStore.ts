import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { SnapshotError } from './types.js';

/** `<sequence>_<iteration>_world_results.json`, iteration zero-padded. */
export const SNAPSHOT_FILE_PATTERN = /^(?:.*_)?(\d+)_world_results\.json$/;

export interface SnapshotStore {
  /** Iteration key -> snapshot path for one phase directory. */
  listIterations(phaseDir: string): Promise<Map<string, string>>;
  /** Parsed snapshot document. */
  load(snapshotPath: string): Promise<unknown>;
}

/** Orders iteration keys numerically; for fixed-width keys this matches lexicographic order. */
export const compareIterationKeys = (a: string, b: string): number => {
  const na = a.replace(/^0+(?=\d)/, '');
  const nb = b.replace(/^0+(?=\d)/, '');
  if (na.length !== nb.length) return na.length - nb.length;
  return na < nb ? -1 : na > nb ? 1 : a < b ? -1 : a > b ? 1 : 0;
};

export const latestIteration = (keys: Iterable<string>): string | undefined =>
  [...keys].sort(compareIterationKeys).at(-1);

export class FileSnapshotStore implements SnapshotStore {
  async listIterations(phaseDir: string): Promise<Map<string, string>> {
    let names: string[];
    try {
      names = await readdir(phaseDir);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SnapshotError(`Cannot list snapshots in ${phaseDir}: ${message}`, phaseDir);
    }
    const iterations = new Map<string, string>();
    for (const name of names.sort()) {
      const match = SNAPSHOT_FILE_PATTERN.exec(name);
      if (match) {
        iterations.set(match[1], join(phaseDir, name));
      }
    }
    return iterations;
  }

  async load(snapshotPath: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(snapshotPath, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SnapshotError(`Cannot read snapshot ${snapshotPath}: ${message}`, snapshotPath);
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SnapshotError(`Snapshot ${snapshotPath} is not valid JSON: ${message}`, snapshotPath);
    }
  }
}
