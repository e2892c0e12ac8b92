import { BODY25_CONVENTION, type KeypointConvention } from '../skeleton/conventions.js';

export const RENDER_VIEWS = ['src_cam', 'front', 'above', 'side'] as const;
export type RenderView = (typeof RENDER_VIEWS)[number];

export const isRenderView = (value: string): value is RenderView =>
  RENDER_VIEWS.some((view) => view === value);

/**
 * `shared`: every phase camera stream goes to `world/camera`, the last phase wins.
 * `per-phase`: each phase gets `world/phase_<name>/camera`.
 */
export type CameraMode = 'shared' | 'per-phase';

export const DEFAULT_PHASES = ['motion_chunks'] as const;
export const RECORDING_FILENAME = 'log.recording.json';

export type RenderOptions = {
  readonly phases: readonly string[];
  readonly renderViews: readonly RenderView[];
  readonly grid: boolean;
  readonly renderLayers: boolean;
  readonly renderKeypoints: boolean;
  readonly saveFrames: boolean;
  readonly accumulate: boolean;
  readonly overwrite: boolean;
  readonly cameraMode: CameraMode;
  readonly convention: KeypointConvention;
};

export const createDefaultRenderOptions = (overrides: Partial<RenderOptions> = {}): RenderOptions => ({
  phases: [...DEFAULT_PHASES],
  renderViews: [...RENDER_VIEWS],
  grid: false,
  renderLayers: false,
  renderKeypoints: true,
  saveFrames: false,
  accumulate: false,
  overwrite: false,
  cameraMode: 'shared',
  convention: BODY25_CONVENTION,
  ...overrides,
});
