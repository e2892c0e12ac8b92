import process from 'node:process';

import { createLogger } from '../logging/logger.js';
import { selectDevice } from '../launcher/device.js';
import {
  readWorkerRequest,
  reportFromOutcome,
  toRenderOptions,
  type WorkerReply,
} from '../launcher/messages.js';
import { createDefaultDependencies, renderRun } from '../scene/orchestrator.js';

const sendReply = (reply: WorkerReply): Promise<void> =>
  new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error('runWorker must be started by the launcher with an IPC channel'));
      return;
    }
    process.send(reply, undefined, {}, (error) => (error ? reject(error) : resolve()));
  });

const handleRequest = async (message: unknown): Promise<WorkerReply> => {
  const request = readWorkerRequest(message);
  if (!request) {
    return { kind: 'failed', errorName: 'ProtocolError', message: 'Expected a run request' };
  }
  const { task } = request;
  const logger = createLogger('worker').child(String(task.index));
  try {
    selectDevice(task.deviceId);
    const outcome = await renderRun(
      {
        logDir: task.logDir,
        outputDir: task.outputDir,
        deviceId: task.deviceId,
        options: toRenderOptions(task.options),
      },
      createDefaultDependencies(logger),
    );
    return { kind: 'done', report: reportFromOutcome(outcome) };
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    logger.error(failure.message, { error: failure.name });
    return { kind: 'failed', errorName: failure.name, message: failure.message };
  }
};

process.once('message', (message: unknown) => {
  handleRequest(message)
    .then(sendReply)
    .then(() => process.disconnect?.())
    .catch((error) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
});
