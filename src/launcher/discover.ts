import { readdir } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';

import { RUN_CONFIG_DIR } from '../config/runConfig.js';

/**
 * Every directory under `root` (root included) holding a `.run-config` directory,
 * sorted by path. Hidden directories are not descended into.
 */
export const discoverRunDirs = async (root: string): Promise<string[]> => {
  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    const subdirs: string[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      if (entry.name === RUN_CONFIG_DIR) {
        found.push(dir);
      } else if (!entry.name.startsWith('.')) {
        subdirs.push(join(dir, entry.name));
      }
    }
    for (const subdir of subdirs) {
      await walk(subdir);
    }
  };
  await walk(root);
  return found.sort();
};

export const assignDevice = (devices: readonly string[], index: number): string => {
  if (devices.length === 0) {
    throw new RangeError('At least one device id is required');
  }
  return devices[index % devices.length];
};

/**
 * `saveRoot/<a>-<b>` from the first two components of the run path relative to the
 * log root; the run directory itself when no save root is given.
 */
export const outputDirFor = (logRoot: string, runDir: string, saveRoot: string | null): string => {
  if (saveRoot === null) {
    return runDir;
  }
  const parts = relative(logRoot, runDir)
    .split(sep)
    .filter((part) => part.length > 0);
  const name = parts.slice(0, 2).join('-');
  return name.length > 0 ? join(saveRoot, name) : saveRoot;
};
