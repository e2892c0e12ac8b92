/** -1 out of frame, 0 occluded, 1 visible. */
export type VisibilityCode = -1 | 0 | 1;

export const VISIBILITY = {
  OUT_OF_FRAME: -1,
  OCCLUDED: 0,
  VISIBLE: 1,
} as const satisfies Record<string, VisibilityCode>;

export type RenderDecision = 'render' | 'clear';

/**
 * Occluded tracks still render; only out-of-frame tracks are cleared.
 */
export const decideVisibility = (code: number): RenderDecision => (code >= 0 ? 'render' : 'clear');

/** Per-track, per-frame visibility codes. */
export type VisibilityMask = readonly (readonly number[])[];

export const visibilityAt = (mask: VisibilityMask, track: number, frame: number): number => {
  const row = mask[track];
  if (!row || frame < 0 || frame >= row.length) {
    throw new RangeError(`No visibility code for track ${track} at frame ${frame}`);
  }
  return row[frame];
};
