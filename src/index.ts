export * from './recording/types.js';
export {
  Recording,
  RecordingFormatError,
  orderEntries,
  parseRecording,
  readRecording,
  type PersistedRecording,
} from './recording/recording.js';
export * from './recording/query.js';
export * from './visibility/gate.js';
export * from './skeleton/conventions.js';
export * from './skeleton/extract.js';
export * from './camera/trajectory.js';
export * from './mesh/producer.js';
export * from './phases/types.js';
export * from './phases/snapshotStore.js';
export { PhaseResolver, INPUT_PHASE, INPUT_ITERATION, WORLD_BLOCK } from './phases/resolver.js';
export * from './bodyModel/types.js';
export * from './bodyModel/templateModel.js';
export type { DatasetAdapter } from './dataset/types.js';
export { DatasetValidationError, loadFileDataset, parseDataset } from './dataset/fileDataset.js';
export * from './config/runConfig.js';
export * from './config/renderOptions.js';
export * from './scene/orchestrator.js';
export * from './launcher/launcher.js';
export { DeviceUnavailableError, selectDevice } from './launcher/device.js';
export { assignDevice, discoverRunDirs, outputDirFor } from './launcher/discover.js';
export { createLogger, type Logger, type LogLevel } from './logging/logger.js';
