/**
 * Loosely-typed Kubernetes documents and safe accessors over them.
 *
 * Custom resources come back from the API server as plain JSON whose shape drifts
 * between operator releases. Every accessor here walks a path of keys and returns a
 * default as soon as a segment is missing, null, or not an object. None of them throw.
 */

export type RawScalar = string | number | boolean | null;

export type RawValue = RawScalar | RawValue[] | RawDocument;

export interface RawDocument {
  readonly [key: string]: RawValue | undefined;
}

export type DocumentPath = readonly string[];

export function isRawDocument(value: unknown): value is RawDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getPath(root: unknown, path: DocumentPath): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (!isRawDocument(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function isPresent(root: unknown, path: DocumentPath): boolean {
  const value = getPath(root, path);
  return value !== undefined && value !== null;
}

export function getRecord(root: unknown, path: DocumentPath): RawDocument {
  const value = getPath(root, path);
  return isRawDocument(value) ? value : {};
}

/**
 * Scalar at `path` as a string, or undefined when it is absent or not a scalar.
 * Empty strings and zero are kept.
 */
export function getScalar(root: unknown, path: DocumentPath): string | undefined {
  const value = getPath(root, path);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Text at `path`, with falsy scalars (`''`, `0`, `false`) and non-scalars read as `''`.
 */
export function getText(root: unknown, path: DocumentPath): string {
  const value = getPath(root, path);
  if (!value) return '';
  return getScalar(root, path) ?? '';
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Integer at `path`. Numbers are truncated toward zero, integer strings are parsed,
 * everything else yields undefined.
 */
export function getInteger(root: unknown, path: DocumentPath): number | undefined {
  const value = getPath(root, path);
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return undefined;
    const parsed = Number.parseInt(trimmed, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function getStringMap(root: unknown, path: DocumentPath): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(getRecord(root, path))) {
    if (typeof value === 'string') {
      result[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[key] = String(value);
    }
  }
  return result;
}
