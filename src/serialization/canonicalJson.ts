import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';

const textEncoder = new TextEncoder();

type CanonicalScalar = null | boolean | number | string;

export type CanonicalValue =
  | CanonicalScalar
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

type NumericView =
  | Float32Array
  | Float64Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint8ClampedArray
  | Uint16Array
  | Uint32Array;

const isNumericView = (value: unknown): value is NumericView =>
  ArrayBuffer.isView(value) && !(value instanceof DataView) && !isBigIntView(value);

const isBigIntView = (value: unknown): boolean =>
  value instanceof BigInt64Array || value instanceof BigUint64Array;

const trimFraction = (text: string): string => {
  if (!text.includes('.')) {
    return text;
  }
  let trimmed = text;
  while (trimmed.endsWith('0')) {
    trimmed = trimmed.slice(0, -1);
  }
  return trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed;
};

const formatCanonicalNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  if (value === 0) {
    return '0';
  }
  const text = value.toString();
  if (!text.includes('e')) {
    return trimFraction(text);
  }
  const [mantissa, exponentRaw] = text.split('e');
  const exponent = exponentRaw.startsWith('+') ? exponentRaw.slice(1) : exponentRaw;
  return `${trimFraction(mantissa)}e${exponent}`;
};

const normalizeNumber = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  return Object.is(value, -0) ? 0 : value;
};

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const hasToJson = (value: object): value is { toJSON: () => unknown } =>
  'toJSON' in value && typeof value.toJSON === 'function';

const sortKeys = (keys: string[]): string[] => keys.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

const normalizeEntries = (entries: [string, unknown][]): { [key: string]: CanonicalValue } => {
  const result: { [key: string]: CanonicalValue } = {};
  const byKey = new Map(entries);
  for (const key of sortKeys([...byKey.keys()])) {
    const normalized = normalizeValue(byKey.get(key), false);
    if (normalized !== undefined) {
      result[key] = normalized;
    }
  }
  return result;
};

const normalizeValue = (value: unknown, inArray: boolean): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return inArray ? null : undefined;
    case 'number':
      return normalizeNumber(value);
    case 'string':
    case 'boolean':
      return value;
    case 'bigint':
      throw new TypeError('Canonical JSON does not support bigint values');
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => normalizeValue(entry, true) ?? null);
  }
  if (isNumericView(value)) {
    return Array.from(value, (entry) => normalizeNumber(entry));
  }
  if (value instanceof ArrayBuffer) {
    return Array.from(new Uint8Array(value));
  }
  if (typeof value !== 'object') {
    return undefined;
  }
  if (hasToJson(value)) {
    return normalizeValue(value.toJSON(), inArray);
  }
  if (value instanceof Map) {
    return normalizeEntries(
      Array.from(value.entries(), ([key, entry]): [string, unknown] => [String(key), entry]),
    );
  }
  if (value instanceof Set) {
    return Array.from(value)
      .sort()
      .map((entry: unknown) => normalizeValue(entry, true) ?? null);
  }
  if (!isPlainObject(value)) {
    throw new TypeError('Unsupported canonical JSON value encountered during normalization');
  }
  return normalizeEntries(Object.entries(value));
};

const stringifyCanonicalValue = (
  value: CanonicalValue,
  indentUnit: string | undefined,
  depth: number,
): string => {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return formatCanonicalNumber(value);
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  const parts: string[] = Array.isArray(value)
    ? value.map((entry) => stringifyCanonicalValue(entry, indentUnit, depth + 1))
    : Object.keys(value).map(
        (key) =>
          `${JSON.stringify(key)}:${indentUnit === undefined ? '' : ' '}${stringifyCanonicalValue(
            value[key],
            indentUnit,
            depth + 1,
          )}`,
      );
  const [open, close] = Array.isArray(value) ? ['[', ']'] : ['{', '}'];
  if (parts.length === 0) {
    return `${open}${close}`;
  }
  if (indentUnit === undefined) {
    return `${open}${parts.join(',')}${close}`;
  }
  const nextIndent = indentUnit.repeat(depth + 1);
  const baseIndent = indentUnit.repeat(depth);
  return `${open}\n${parts.map((part) => `${nextIndent}${part}`).join(',\n')}\n${baseIndent}${close}`;
};

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

export const toCanonicalValue = (value: unknown): CanonicalValue =>
  normalizeValue(value, false) ?? null;

export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const indentSize =
    typeof options.indent === 'number' && options.indent > 0
      ? Math.min(Math.floor(options.indent), 10)
      : undefined;
  const indentUnit = indentSize !== undefined ? ' '.repeat(indentSize) : undefined;
  return stringifyCanonicalValue(toCanonicalValue(value), indentUnit, 0);
};

export const hashBytes = (bytes: Uint8Array): string => bytesToHex(blake3(bytes));

export const hashCanonicalJsonString = (json: string): string =>
  hashBytes(textEncoder.encode(json));

/** BLAKE3-256 over the canonical encoding; equal values always hash equal. */
export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
