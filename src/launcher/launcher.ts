import { fork } from 'node:child_process';
import { dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { RenderOptions } from '../config/renderOptions.js';
import type { Logger } from '../logging/logger.js';
import { renderRun, type RunDependencies } from '../scene/orchestrator.js';
import { selectDevice } from './device.js';
import { assignDevice, discoverRunDirs, outputDirFor } from './discover.js';
import {
  readWorkerReply,
  reportFromError,
  reportFromOutcome,
  toRenderOptions,
  toTaskOptions,
  type RenderTask,
  type TaskReport,
  type WorkerReply,
  type WorkerRequest,
} from './messages.js';
import { runPool } from './pool.js';

export type LaunchRequest = {
  readonly logRoot: string;
  readonly saveRoot: string | null;
  readonly devices: readonly string[];
  readonly options: RenderOptions;
};

export type TaskRunner = (task: RenderTask) => Promise<TaskReport>;

export type TaskOutcome = {
  readonly task: RenderTask;
  readonly report: TaskReport;
};

export type LaunchReport = {
  readonly outcomes: TaskOutcome[];
  readonly rendered: number;
  readonly skipped: number;
  readonly failed: number;
};

export const planTasks = async (request: LaunchRequest): Promise<RenderTask[]> => {
  const runDirs = await discoverRunDirs(request.logRoot);
  const options = toTaskOptions(request.options);
  return runDirs.map((logDir, index) => ({
    index,
    logDir,
    outputDir: outputDirFor(request.logRoot, logDir, request.saveRoot),
    deviceId: assignDevice(request.devices, index),
    options,
  }));
};

/** Renders in the calling process; the device env vars stay set afterwards. */
export const createInProcessRunner =
  (deps: RunDependencies): TaskRunner =>
  async (task) => {
    selectDevice(task.deviceId);
    const outcome = await renderRun(
      {
        logDir: task.logDir,
        outputDir: task.outputDir,
        deviceId: task.deviceId,
        options: toRenderOptions(task.options),
      },
      deps,
    );
    return reportFromOutcome(outcome);
  };

const moduleExtension = extname(fileURLToPath(import.meta.url));

export const defaultWorkerPath = (): string =>
  join(dirname(fileURLToPath(import.meta.url)), '..', 'cli', `runWorker${moduleExtension}`);

/**
 * Renders each task in a forked child. The child inherits the parent's exec
 * arguments, so a TypeScript loader in use here is used there too.
 */
export const createChildProcessRunner =
  (workerPath: string = defaultWorkerPath()): TaskRunner =>
  (task) =>
    new Promise<TaskReport>((resolve) => {
      const child = fork(workerPath, [], { stdio: 'inherit' });
      let reply: WorkerReply | null = null;
      child.on('message', (message) => {
        reply ??= readWorkerReply(message);
      });
      child.once('error', (error) => resolve(reportFromError(error)));
      child.once('exit', (code, signal) => {
        if (reply?.kind === 'done') {
          resolve(reply.report);
        } else if (reply?.kind === 'failed') {
          resolve({ status: 'failed', errorName: reply.errorName, message: reply.message });
        } else {
          resolve({
            status: 'failed',
            errorName: 'WorkerExitError',
            message: `worker exited (${signal ?? `code ${code ?? -1}`}) without a reply`,
          });
        }
      });
      const request: WorkerRequest = { kind: 'run', task };
      child.send(request);
    });

export type LaunchHooks = {
  readonly logger: Logger;
  /** Used with exactly one device. */
  readonly inProcess: TaskRunner;
  /** Used with more than one device. */
  readonly childProcess?: TaskRunner;
};

/**
 * Renders every run under the log root. More than one device: a pool of child
 * processes, one lane per device. One device: sequentially in this process.
 */
export const launchRenders = async (request: LaunchRequest, hooks: LaunchHooks): Promise<LaunchReport> => {
  const { logger } = hooks;
  const tasks = await planTasks(request);
  logger.info(`found ${tasks.length} run(s) under ${request.logRoot}`, {
    devices: [...request.devices],
  });

  const parallel = request.devices.length > 1;
  const runner = parallel ? hooks.childProcess ?? createChildProcessRunner() : hooks.inProcess;
  const concurrency = parallel ? request.devices.length : 1;

  const settled = await runPool(tasks, concurrency, async (task) => {
    logger.info(`rendering ${task.logDir}`, { device: task.deviceId, output: task.outputDir });
    return runner(task);
  });

  const outcomes = settled.map((result): TaskOutcome => {
    const task = tasks[result.index];
    const report = result.kind === 'fulfilled' ? result.value : reportFromError(result.error);
    if (report.status === 'failed') {
      logger.error(`run ${task.logDir} failed: ${report.message}`, { error: report.errorName });
    }
    return { task, report };
  });

  const count = (status: TaskReport['status']) =>
    outcomes.filter((outcome) => outcome.report.status === status).length;
  return {
    outcomes,
    rendered: count('rendered'),
    skipped: count('skipped'),
    failed: count('failed'),
  };
};
