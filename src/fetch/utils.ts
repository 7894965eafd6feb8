import type { HeaderMultimap } from '../types/request.js';

/**
 * Merges client default headers with per-request headers into header lines.
 *
 * Names compare case-sensitively: a per-request header replaces a default only
 * when the names match exactly. Defaults keep their position when replaced.
 */
export function mergeHeaders(
  defaultHeaders: ReadonlyMap<string, string>,
  requestHeaders: ReadonlyMap<string, string>,
): Array<[string, string]> {
  const merged = new Map(defaultHeaders);
  for (const [name, value] of requestHeaders) {
    merged.set(name, value);
  }

  return [...merged];
}

/**
 * Collects parsed response headers into a multimap keyed by lower-cased name.
 * A repeated header arrives as an array with one entry per header line, kept in received order.
 */
export function toHeaderMultimap(headers: Readonly<Record<string, string | string[] | undefined>>): HeaderMultimap {
  const multimap = new Map<string, string[]>();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }

    const key = name.toLowerCase();
    const values = multimap.get(key) ?? [];
    values.push(...(typeof value === 'string' ? [value] : value));
    multimap.set(key, values);
  }

  return multimap;
}
