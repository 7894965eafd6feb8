/** Request timeout applied when neither the call nor the client sets one. */
export const DEFAULT_REQUEST_TIMEOUT = 30_000;

/** Connect timeout applied when the builder does not set one. */
export const DEFAULT_CONNECT_TIMEOUT = 10_000;

/**
 * Resolves the effective timeout: per-request override, then client-wide
 * timeout, then {@link DEFAULT_REQUEST_TIMEOUT}.
 */
export function resolveTimeout(requestTimeout: number | null, clientTimeout: number | null): number {
  return requestTimeout ?? clientTimeout ?? DEFAULT_REQUEST_TIMEOUT;
}
