import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';

import {
  asFiniteNumber,
  asString,
  formatIssues,
  hasErrors,
  isRecord,
  pushIssue,
  ValidationError,
  type ValidationIssue,
} from '../validation/issues.js';

/** Sentinel directory marking a completed run; holds the cached run config. */
export const RUN_CONFIG_DIR = '.run-config';
export const RUN_CONFIG_FILE = 'config.json';

export type RunConfig = {
  /** Absolute path of the dataset document. */
  readonly datasetPath: string;
  /** Absolute path of the body-model asset. */
  readonly bodyModelPath: string;
  /** Minimum body-model batch capacity; never below tracks * frames of the run. */
  readonly batchSize: number | null;
  readonly deviceId: string;
};

export class ConfigValidationError extends ValidationError {
  constructor(message: string, issues: ValidationIssue[]) {
    super(message, issues);
    this.name = 'ConfigValidationError';
  }
}

const KNOWN_KEYS = new Set(['datasetPath', 'bodyModelPath', 'batchSize']);

const resolveFrom = (baseDir: string, value: string) =>
  isAbsolute(value) ? value : resolve(baseDir, value);

export const validateRunConfig = (
  payload: unknown,
  runDir: string,
  deviceId: string,
): { config: RunConfig; issues: ValidationIssue[] } => {
  const issues: ValidationIssue[] = [];
  if (!isRecord(payload)) {
    pushIssue(issues, 'config/type', 'Run config root must be an object', []);
    throw new ConfigValidationError('Run config root must be an object', issues);
  }

  for (const key of Object.keys(payload)) {
    if (!KNOWN_KEYS.has(key)) {
      pushIssue(issues, 'config/unknown-key', `Unknown run config key "${key}" ignored`, [key], 'warning');
    }
  }

  const datasetPath = asString(payload.datasetPath);
  if (!datasetPath) {
    pushIssue(issues, 'config/dataset-path', 'datasetPath must be a non-empty string', ['datasetPath']);
  }
  const bodyModelPath = asString(payload.bodyModelPath);
  if (!bodyModelPath) {
    pushIssue(issues, 'config/body-model-path', 'bodyModelPath must be a non-empty string', [
      'bodyModelPath',
    ]);
  }

  let batchSize: number | null = null;
  if (payload.batchSize !== undefined && payload.batchSize !== null) {
    const value = asFiniteNumber(payload.batchSize);
    if (value === null || !Number.isInteger(value) || value <= 0) {
      pushIssue(issues, 'config/batch-size', 'batchSize must be a positive integer', ['batchSize']);
    } else {
      batchSize = value;
    }
  }

  if (hasErrors(issues) || !datasetPath || !bodyModelPath) {
    throw new ConfigValidationError(`Run config is invalid: ${formatIssues(issues)}`, issues);
  }

  return {
    config: {
      datasetPath: resolveFrom(runDir, datasetPath),
      bodyModelPath: resolveFrom(runDir, bodyModelPath),
      batchSize,
      deviceId,
    },
    issues,
  };
};

export const runConfigPath = (runDir: string) => join(runDir, RUN_CONFIG_DIR, RUN_CONFIG_FILE);

export const loadRunConfig = async (
  runDir: string,
  deviceId: string,
): Promise<{ config: RunConfig; issues: ValidationIssue[] }> => {
  const path = runConfigPath(runDir);
  let payload: unknown;
  try {
    payload = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Cannot read run config ${path}: ${message}`, []);
  }
  return validateRunConfig(payload, runDir, deviceId);
};
