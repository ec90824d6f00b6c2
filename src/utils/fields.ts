/**
 * Lookups over untyped JSON documents
 *
 * Cache files may have been written by an older schema (flat keys such as
 * `quota_used_pct`) or by the current one (nested `current_session.percent_used`).
 * Readers ask for a list of paths in priority order and take the first one set.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk a dotted path ("current_session.percent_used") through nested objects.
 */
export function getPath(doc: unknown, path: string): unknown {
  let node: unknown = doc;
  for (const key of path.split('.')) {
    if (!isJsonObject(node)) return undefined;
    node = node[key];
  }
  return node;
}

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * First path whose value is set (not undefined, null or "").
 */
export function firstSet(doc: unknown, ...paths: string[]): unknown {
  for (const path of paths) {
    const value = getPath(doc, path);
    if (isSet(value)) return value;
  }
  return undefined;
}

/**
 * First set value rendered as a string; numbers and booleans are stringified.
 */
export function firstString(doc: unknown, ...paths: string[]): string {
  const value = firstSet(doc, ...paths);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Value at `path` when it is a number, boolean or null; anything else becomes null.
 */
export function scalarOrNull(doc: unknown, path: string): number | boolean | null {
  const value = getPath(doc, path);
  return typeof value === 'number' || typeof value === 'boolean' ? value : null;
}

export function flagSet(doc: unknown, path: string): boolean {
  return getPath(doc, path) === true;
}
