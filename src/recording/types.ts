/** Timeline every per-frame entity is keyed on. */
export const INPUT_FRAME_TIMELINE = 'input_frame_id';

export type TimePoint = {
  readonly timeline: string;
  readonly frame: number;
};

export const atFrame = (frame: number, timeline: string = INPUT_FRAME_TIMELINE): TimePoint => ({
  timeline,
  frame,
});

export type NumberList = ArrayLike<number>;

export type Vec3Tuple = readonly [number, number, number];
/** Quaternion in [x, y, z, w] order. */
export type QuatTuple = readonly [number, number, number, number];

export type ViewUp = '+X' | '-X' | '+Y' | '-Y' | '+Z' | '-Z';

type EntryBase<K extends string> = {
  readonly kind: K;
  readonly path: string;
  /** null for timeless entries. */
  readonly time: TimePoint | null;
};

export type ViewCoordinatesEntry = EntryBase<'view-coordinates'> & {
  readonly up: ViewUp;
};

export type ImageFileEntry = EntryBase<'image'> & {
  readonly source: string;
};

export type PinholeEntry = EntryBase<'pinhole'> & {
  readonly width: number;
  readonly height: number;
  /** Row-major 3x3 intrinsic matrix. */
  readonly intrinsics: NumberList;
};

export type RigidTransformEntry = EntryBase<'transform'> & {
  readonly translation: Vec3Tuple;
  readonly rotation: QuatTuple;
  readonly relation: 'child-from-parent';
  /** Axis convention of the child frame, e.g. RDF = right, down, forward. */
  readonly xyz: string;
};

export type MeshEntry = EntryBase<'mesh'> & {
  readonly vertices: NumberList;
  readonly indices: NumberList;
  readonly normals?: NumberList;
};

export type LineSegmentsEntry = EntryBase<'line-segments'> & {
  /** Flat endpoint list: [x0, y0, x1, y1, ...] per segment, `dimension` values per point. */
  readonly points: NumberList;
  readonly dimension: 2 | 3;
};

export type Points2DEntry = EntryBase<'points2d'> & {
  readonly positions: NumberList;
};

export type ClearEntry = EntryBase<'clear'>;

export type RecordingEntry =
  | ViewCoordinatesEntry
  | ImageFileEntry
  | PinholeEntry
  | RigidTransformEntry
  | MeshEntry
  | LineSegmentsEntry
  | Points2DEntry
  | ClearEntry;

export type RecordingEntryKind = RecordingEntry['kind'];

export const RECORDING_FORMAT = 'motionvis-recording';
export const RECORDING_VERSION = 1;

export type RecordingDocument = {
  readonly format: typeof RECORDING_FORMAT;
  readonly version: typeof RECORDING_VERSION;
  readonly applicationId: string;
  readonly timelines: string[];
  readonly entries: RecordingEntry[];
};
