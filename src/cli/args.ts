import {
  createDefaultRenderOptions,
  DEFAULT_PHASES,
  isRenderView,
  RENDER_VIEWS,
  type CameraMode,
  type RenderOptions,
  type RenderView,
} from '../config/renderOptions.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const DEFAULT_DEVICES = ['0'] as const;
export const DEFAULT_VIEWER_PORT = 9877;

export type RenderCommand = {
  help: boolean;
  logRoot: string;
  saveRoot: string | null;
  devices: string[];
  json: boolean;
  options: RenderOptions;
};

export type InspectCommand = {
  help: boolean;
  recording: string;
  frame: number | null;
  json: boolean;
};

export type ServeCommand = {
  help: boolean;
  recording: string;
  port: number;
};

/** Values following `args[start]` up to the next flag. */
const takeList = (args: readonly string[], start: number): string[] => {
  const values: string[] = [];
  for (let i = start + 1; i < args.length && !args[i].startsWith('--'); i++) {
    values.push(args[i]);
  }
  return values;
};

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
};

const parseNonNegativeInt = (raw: string, flag: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return value;
};

const isHelp = (args: readonly string[]) => args.includes('--help') || args.includes('-h');

export const parseRenderArgs = (args: readonly string[]): RenderCommand => {
  let logRoot: string | null = null;
  let saveRoot: string | null = null;
  let devices: string[] = [...DEFAULT_DEVICES];
  let phases: string[] = [...DEFAULT_PHASES];
  let renderViews: RenderView[] = [...RENDER_VIEWS];
  let cameraMode: CameraMode = 'shared';
  let json = false;
  const toggles = {
    grid: false,
    renderLayers: false,
    renderKeypoints: true,
    saveFrames: false,
    accumulate: false,
    overwrite: false,
  };

  if (isHelp(args)) {
    return {
      help: true,
      logRoot: '',
      saveRoot,
      devices,
      json,
      options: createDefaultRenderOptions(),
    };
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--log-root':
        logRoot = takeValue(args, i, arg);
        i += 1;
        break;
      case '--save-root':
        saveRoot = takeValue(args, i, arg);
        i += 1;
        break;
      case '--phases':
        phases = takeList(args, i);
        i += phases.length;
        if (phases.length === 0) throw new UsageError('--phases requires at least one phase name');
        break;
      case '--gpus':
        devices = takeList(args, i);
        i += devices.length;
        if (devices.length === 0) throw new UsageError('--gpus requires at least one device id');
        break;
      case '--render-views': {
        const views = takeList(args, i);
        i += views.length;
        renderViews = views.map((view) => {
          if (!isRenderView(view)) {
            throw new UsageError(`Unknown view "${view}". Use ${RENDER_VIEWS.join(', ')}.`);
          }
          return view;
        });
        break;
      }
      case '--camera-mode': {
        const mode = takeValue(args, i, arg);
        i += 1;
        if (mode !== 'shared' && mode !== 'per-phase') {
          throw new UsageError(`Unknown camera mode "${mode}". Use shared or per-phase.`);
        }
        cameraMode = mode;
        break;
      }
      case '--grid':
        toggles.grid = true;
        break;
      case '--render-layers':
        toggles.renderLayers = true;
        break;
      case '--no-render-kps':
        toggles.renderKeypoints = false;
        break;
      case '--save-frames':
        toggles.saveFrames = true;
        break;
      case '--accumulate':
        toggles.accumulate = true;
        break;
      case '--overwrite':
        toggles.overwrite = true;
        break;
      case '--json':
        json = true;
        break;
      default:
        throw new UsageError(`Unknown flag "${arg}"`);
    }
  }

  if (logRoot === null) {
    throw new UsageError('render requires --log-root');
  }
  return {
    help: false,
    logRoot,
    saveRoot,
    devices,
    json,
    options: createDefaultRenderOptions({ phases, renderViews, cameraMode, ...toggles }),
  };
};

export const parseInspectArgs = (args: readonly string[]): InspectCommand => {
  if (isHelp(args)) return { help: true, recording: '', frame: null, json: false };
  let recording: string | null = null;
  let frame: number | null = null;
  let json = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--frame') {
      frame = parseNonNegativeInt(takeValue(args, i, arg), arg);
      i += 1;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown flag "${arg}"`);
    } else if (recording === null) {
      recording = arg;
    } else {
      throw new UsageError(`Unexpected argument "${arg}"`);
    }
  }
  if (recording === null) {
    throw new UsageError('inspect requires a recording path');
  }
  return { help: false, recording, frame, json };
};

export const parseServeArgs = (args: readonly string[]): ServeCommand => {
  if (isHelp(args)) return { help: true, recording: '', port: DEFAULT_VIEWER_PORT };
  let recording: string | null = null;
  let port = DEFAULT_VIEWER_PORT;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--port') {
      port = parseNonNegativeInt(takeValue(args, i, arg), arg);
      i += 1;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown flag "${arg}"`);
    } else if (recording === null) {
      recording = arg;
    } else {
      throw new UsageError(`Unexpected argument "${arg}"`);
    }
  }
  if (recording === null) {
    throw new UsageError('serve requires a recording path');
  }
  return { help: false, recording, port };
};
