export class DeviceUnavailableError extends Error {
  readonly deviceId: string;

  constructor(deviceId: string, reason: string) {
    super(`Device "${deviceId}" is unavailable: ${reason}`);
    this.name = 'DeviceUnavailableError';
    this.deviceId = deviceId;
  }
}

export const DEVICE_ENV_KEYS = ['EGL_DEVICE_ID', 'CUDA_VISIBLE_DEVICES'] as const;

const DEVICE_ID_PATTERN = /^\d+$/;

/** Pins the current process to `deviceId` through the rendering and compute env vars. */
export const selectDevice = (deviceId: string, env: NodeJS.ProcessEnv = process.env): void => {
  if (!DEVICE_ID_PATTERN.test(deviceId)) {
    throw new DeviceUnavailableError(deviceId, 'expected a non-negative integer index');
  }
  for (const key of DEVICE_ENV_KEYS) {
    env[key] = deviceId;
  }
};
