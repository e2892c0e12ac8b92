export type IssuePath = readonly (string | number)[];

export interface ValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: IssuePath;
  readonly severity: 'error' | 'warning';
}

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);
export const asFiniteNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const pushIssue = (
  issues: ValidationIssue[],
  code: string,
  message: string,
  path: IssuePath,
  severity: ValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

export const hasErrors = (issues: readonly ValidationIssue[]): boolean =>
  issues.some((issue) => issue.severity === 'error');

export const formatIssues = (issues: readonly ValidationIssue[]): string =>
  issues
    .filter((issue) => issue.severity === 'error')
    .map((issue) => `${issue.message} (${issue.code} @ ${issue.path.join('.') || '<root>'})`)
    .join('; ');

/**
 * Reads a numeric tensor of the given shape out of nested JSON arrays into a flat
 * Float64Array (row-major). Records an issue and returns null on any mismatch.
 */
export const readTensor = (
  value: unknown,
  shape: readonly number[],
  issues: ValidationIssue[],
  path: IssuePath,
  code: string,
): Float64Array | null => {
  const size = shape.reduce((total, dim) => total * dim, 1);
  const out = new Float64Array(size);
  let cursor = 0;
  const visit = (node: unknown, depth: number, nodePath: IssuePath): boolean => {
    if (depth === shape.length) {
      const numeric = asFiniteNumber(node);
      if (numeric === null) {
        pushIssue(issues, code, 'Expected a finite number', nodePath);
        return false;
      }
      out[cursor++] = numeric;
      return true;
    }
    if (!Array.isArray(node) || node.length !== shape[depth]) {
      pushIssue(
        issues,
        code,
        `Expected an array of length ${shape[depth]}`,
        nodePath,
      );
      return false;
    }
    for (let i = 0; i < node.length; i++) {
      if (!visit(node[i], depth + 1, [...nodePath, i])) {
        return false;
      }
    }
    return true;
  };
  return visit(value, 0, path) ? out : null;
};

/** Length of the outermost array, or null when the value is not an array. */
export const outerLength = (value: unknown): number | null =>
  Array.isArray(value) ? value.length : null;
