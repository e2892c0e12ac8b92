import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { hashCanonicalJson } from '../serialization/canonicalJson.js';
import {
  asFiniteNumber,
  asString,
  formatIssues,
  isRecord,
  pushIssue,
  ValidationError,
  type ValidationIssue,
} from '../validation/issues.js';
import {
  RECORDING_FORMAT,
  RECORDING_VERSION,
  type LineSegmentsEntry,
  type MeshEntry,
  type NumberList,
  type PinholeEntry,
  type QuatTuple,
  type RecordingDocument,
  type RecordingEntry,
  type RecordingEntryKind,
  type TimePoint,
  type Vec3Tuple,
  type ViewUp,
} from './types.js';

const STAGE_RANK: Record<RecordingEntryKind, number> = {
  'view-coordinates': 0,
  transform: 1,
  pinhole: 1,
  image: 2,
  'line-segments': 3,
  points2d: 3,
  mesh: 3,
  clear: 3,
};

const compareTime = (a: TimePoint | null, b: TimePoint | null): number => {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  if (a.timeline !== b.timeline) {
    return a.timeline < b.timeline ? -1 : 1;
  }
  return a.frame - b.frame;
};

/**
 * Orders entries for playback: timeless first, then by timeline key; inside one key
 * camera pose and pinhole entries precede images and geometry. Ties keep insertion order.
 */
export const orderEntries = (entries: readonly RecordingEntry[]): RecordingEntry[] =>
  entries
    .map((entry, index) => ({ entry, index }))
    .sort(
      (a, b) =>
        compareTime(a.entry.time, b.entry.time) ||
        STAGE_RANK[a.entry.kind] - STAGE_RANK[b.entry.kind] ||
        a.index - b.index,
    )
    .map(({ entry }) => entry);

export type PersistedRecording = {
  path: string;
  hash: string;
  bytes: number;
  entries: number;
};

export class Recording {
  readonly applicationId: string;
  private readonly log: RecordingEntry[] = [];
  private readonly timelineNames = new Set<string>();

  constructor(applicationId: string) {
    this.applicationId = applicationId;
  }

  get size(): number {
    return this.log.length;
  }

  append(entry: RecordingEntry): void {
    if (entry.time) {
      if (!Number.isInteger(entry.time.frame) || entry.time.frame < 0) {
        throw new RangeError(`Timeline key must be a non-negative integer (received ${entry.time.frame})`);
      }
      this.timelineNames.add(entry.time.timeline);
    }
    this.log.push(entry);
  }

  logViewCoordinates(path: string, up: ViewUp): void {
    this.append({ kind: 'view-coordinates', path, time: null, up });
  }

  logImageFile(path: string, time: TimePoint, source: string): void {
    this.append({ kind: 'image', path, time, source });
  }

  logPinhole(
    path: string,
    time: TimePoint | null,
    pinhole: Omit<PinholeEntry, 'kind' | 'path' | 'time'>,
  ): void {
    this.append({ kind: 'pinhole', path, time, ...pinhole });
  }

  logRigidTransform(
    path: string,
    time: TimePoint | null,
    translation: Vec3Tuple,
    rotation: QuatTuple,
    xyz = 'RDF',
  ): void {
    this.append({
      kind: 'transform',
      path,
      time,
      translation,
      rotation,
      relation: 'child-from-parent',
      xyz,
    });
  }

  logMesh(path: string, time: TimePoint, mesh: Omit<MeshEntry, 'kind' | 'path' | 'time'>): void {
    this.append({ kind: 'mesh', path, time, ...mesh });
  }

  logLineSegments(
    path: string,
    time: TimePoint | null,
    points: NumberList,
    dimension: LineSegmentsEntry['dimension'] = 2,
  ): void {
    this.append({ kind: 'line-segments', path, time, points, dimension });
  }

  logPoints2D(path: string, time: TimePoint, positions: NumberList): void {
    this.append({ kind: 'points2d', path, time, positions });
  }

  logCleared(path: string, time: TimePoint): void {
    this.append({ kind: 'clear', path, time });
  }

  entries(): RecordingEntry[] {
    return orderEntries(this.log);
  }

  toDocument(): RecordingDocument {
    return {
      format: RECORDING_FORMAT,
      version: RECORDING_VERSION,
      applicationId: this.applicationId,
      timelines: [...this.timelineNames].sort(),
      entries: this.entries(),
    };
  }

  serialize(): { json: string; hash: string } {
    return hashCanonicalJson(this.toDocument());
  }

  /**
   * Writes the whole recording to a temporary sibling and renames it into place, so
   * readers never observe a partial file. The BLAKE3 hash goes to `<path>.blake3`.
   */
  async persist(filePath: string): Promise<PersistedRecording> {
    const { json, hash } = this.serialize();
    await mkdir(dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp-${process.pid}`;
    try {
      await writeFile(tempPath, json, 'utf8');
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    await writeFile(`${filePath}.blake3`, `${hash}\n`, 'utf8');
    return {
      path: filePath,
      hash,
      bytes: Buffer.byteLength(json, 'utf8'),
      entries: this.log.length,
    };
  }
}

const ENTRY_KINDS = new Set<string>(Object.keys(STAGE_RANK));

const isEntryKind = (value: string): value is RecordingEntryKind => ENTRY_KINDS.has(value);

const readTime = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): TimePoint | null | undefined => {
  if (value === null) {
    return null;
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'recording/entry/time', 'Entry time must be null or an object', path);
    return undefined;
  }
  const timeline = asString(value.timeline);
  const frame = asFiniteNumber(value.frame);
  if (timeline === null || frame === null || !Number.isInteger(frame) || frame < 0) {
    pushIssue(issues, 'recording/entry/time', 'Entry time needs a timeline and an integer frame', path);
    return undefined;
  }
  return { timeline, frame };
};

const VIEW_UPS = new Set<string>(['+X', '-X', '+Y', '-Y', '+Z', '-Z']);

const isViewUp = (value: string): value is ViewUp => VIEW_UPS.has(value);

const readNumbers = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): number[] | null => {
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'number')) {
    pushIssue(issues, 'recording/entry/numbers', 'Expected an array of numbers', path);
    return null;
  }
  return value.filter((item): item is number => typeof item === 'number');
};

const readFixed = <N extends 3 | 4>(
  value: unknown,
  length: N,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): number[] | null => {
  const numbers = readNumbers(value, issues, path);
  if (numbers && numbers.length !== length) {
    pushIssue(issues, 'recording/entry/length', `Expected ${length} numbers`, path);
    return null;
  }
  return numbers;
};

const readEntryComponents = (
  raw: Record<string, unknown>,
  kind: RecordingEntryKind,
  path: string,
  time: TimePoint | null,
  issues: ValidationIssue[],
  at: readonly (string | number)[],
): RecordingEntry | null => {
  switch (kind) {
    case 'view-coordinates': {
      const up = asString(raw.up);
      if (up === null || !isViewUp(up)) {
        pushIssue(issues, 'recording/entry/up', 'View coordinates need an axis', [...at, 'up']);
        return null;
      }
      return { kind, path, time, up };
    }
    case 'image': {
      const source = asString(raw.source);
      if (source === null) {
        pushIssue(issues, 'recording/entry/source', 'Image entry needs a source', [...at, 'source']);
        return null;
      }
      if (time === null) {
        pushIssue(issues, 'recording/entry/time', 'Image entry needs a time', [...at, 'time']);
        return null;
      }
      return { kind, path, time, source };
    }
    case 'pinhole': {
      const width = asFiniteNumber(raw.width);
      const height = asFiniteNumber(raw.height);
      const intrinsics = readNumbers(raw.intrinsics, issues, [...at, 'intrinsics']);
      if (width === null || height === null || intrinsics === null) {
        pushIssue(issues, 'recording/entry/pinhole', 'Pinhole entry is incomplete', at);
        return null;
      }
      return { kind, path, time, width, height, intrinsics };
    }
    case 'transform': {
      const t = readFixed(raw.translation, 3, issues, [...at, 'translation']);
      const q = readFixed(raw.rotation, 4, issues, [...at, 'rotation']);
      if (t === null || q === null) {
        return null;
      }
      return {
        kind,
        path,
        time,
        translation: [t[0], t[1], t[2]],
        rotation: [q[0], q[1], q[2], q[3]],
        relation: 'child-from-parent',
        xyz: asString(raw.xyz) ?? 'RDF',
      };
    }
    case 'mesh': {
      const vertices = readNumbers(raw.vertices, issues, [...at, 'vertices']);
      const indices = readNumbers(raw.indices, issues, [...at, 'indices']);
      const normals =
        raw.normals === undefined ? undefined : readNumbers(raw.normals, issues, [...at, 'normals']);
      if (vertices === null || indices === null || normals === null || time === null) {
        return null;
      }
      return normals === undefined
        ? { kind, path, time, vertices, indices }
        : { kind, path, time, vertices, indices, normals };
    }
    case 'line-segments': {
      const points = readNumbers(raw.points, issues, [...at, 'points']);
      const dimension = raw.dimension === 3 ? 3 : 2;
      return points === null ? null : { kind, path, time, points, dimension };
    }
    case 'points2d': {
      const positions = readNumbers(raw.positions, issues, [...at, 'positions']);
      return positions === null || time === null ? null : { kind, path, time, positions };
    }
    case 'clear':
      if (time === null) {
        pushIssue(issues, 'recording/entry/time', 'Clear entry needs a time', [...at, 'time']);
        return null;
      }
      return { kind, path, time };
  }
};

export class RecordingFormatError extends ValidationError {
  constructor(message: string, issues: ValidationIssue[]) {
    super(message, issues);
    this.name = 'RecordingFormatError';
  }
}

/** Parses a persisted recording; every entry's components are checked against its kind. */
export const parseRecording = (json: string): RecordingDocument => {
  const issues: ValidationIssue[] = [];
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed) || parsed.format !== RECORDING_FORMAT || parsed.version !== RECORDING_VERSION) {
    pushIssue(issues, 'recording/header', `Not a ${RECORDING_FORMAT} v${RECORDING_VERSION} document`, []);
    throw new RecordingFormatError('Recording header is invalid', issues);
  }
  const rawEntries = Array.isArray(parsed.entries) ? parsed.entries : [];
  const entries: RecordingEntry[] = [];
  rawEntries.forEach((raw: unknown, index: number) => {
    const path = ['entries', index] as const;
    if (!isRecord(raw)) {
      pushIssue(issues, 'recording/entry/type', 'Entry must be an object', path);
      return;
    }
    const kind = asString(raw.kind);
    const entityPath = asString(raw.path);
    const time = readTime(raw.time ?? null, issues, [...path, 'time']);
    if (kind === null || !isEntryKind(kind) || entityPath === null || time === undefined) {
      pushIssue(issues, 'recording/entry/shape', 'Entry needs a known kind and a path', path);
      return;
    }
    const entry = readEntryComponents(raw, kind, entityPath, time, issues, path);
    if (entry) {
      entries.push(entry);
    }
  });
  if (issues.length > 0) {
    throw new RecordingFormatError(`Recording is malformed: ${formatIssues(issues)}`, issues);
  }
  return {
    format: RECORDING_FORMAT,
    version: RECORDING_VERSION,
    applicationId: asString(parsed.applicationId) ?? 'unknown',
    timelines: Array.isArray(parsed.timelines)
      ? parsed.timelines.filter((entry): entry is string => typeof entry === 'string')
      : [],
    entries,
  };
};

export const readRecording = async (filePath: string): Promise<RecordingDocument> =>
  parseRecording(await readFile(filePath, 'utf8'));
