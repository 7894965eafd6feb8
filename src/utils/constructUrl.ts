import { ConstructURLError } from '../error/constructUrlError.js';
import type { QueryParameters } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Encodes query parameters as `application/x-www-form-urlencoded` UTF-8 pairs,
 * one `name=value` pair per value, in name-then-value insertion order.
 */
export function encodeQueryParameters(queryParameters: QueryParameters): string {
  const searchParams = new URLSearchParams();
  for (const [name, values] of queryParameters) {
    for (const value of values) {
      searchParams.append(name, value);
    }
  }

  return searchParams.toString();
}

/**
 * Builds the final request URI.
 *
 * 1. Resolves `path` against `baseUri` (an absolute `path` ignores the base; without
 *    a base, `path` must be absolute).
 * 2. Appends the encoded `queryParameters` to any query already on the resolved URI,
 *    joined by a single `&`; no `?` is left when both are empty.
 * 3. Reassembles scheme, authority, path, query and fragment.
 *
 * Only `http:` and `https:` URIs are accepted.
 */
export function constructUrl(
  baseUri: string | null,
  path: string,
  queryParameters: QueryParameters,
): SafeWrap<ConstructURLError, string> {
  const [errResolve, resolved] = safeWrap(() => (baseUri === null ? new URL(path) : new URL(path, baseUri)));
  if (errResolve) {
    return [new ConstructURLError(`error resolving URI for path '${path}'`, path, { cause: errResolve }), null];
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return [new ConstructURLError(`error unsupported URI scheme '${resolved.protocol}' for path '${path}'`, path), null];
  }

  // `search` is '' for both an absent query and a bare '?'
  const existing = resolved.search.slice(1);
  const encoded = encodeQueryParameters(queryParameters);
  const combined = existing && encoded ? `${existing}&${encoded}` : existing || encoded;

  const [errAssemble] = safeWrap(() => {
    resolved.search = combined;
    if (!resolved.pathname) {
      resolved.pathname = '/';
    }
  });
  if (errAssemble) {
    return [new ConstructURLError(`error reassembling URI for path '${path}'`, path, { cause: errAssemble }), null];
  }

  return [null, resolved.href];
}
