import type { SafeWrapAsync } from '../utils/wrap.js';

/** Methods the client dispatches, in upper case as sent on the wire. */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

/** HTTP method accepted by `RestClient.send`. */
export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Type guard for {@link HttpMethod}; names are case-sensitive. */
export function isHttpMethod(value: unknown): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/** Methods that never carry a request body, whatever the options hold. */
export const BODILESS_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'DELETE', 'HEAD', 'OPTIONS']);

/**
 * Redirect handling of the transport.
 * - `never`: return 3xx responses as they are.
 * - `always`: follow every redirect.
 * - `normal`: follow redirects, except from `https:` to `http:`.
 */
export type RedirectPolicy = 'never' | 'always' | 'normal';

/** Accepted redirect policies. */
export const REDIRECT_POLICIES: readonly RedirectPolicy[] = ['never', 'always', 'normal'];

/** Preferred protocol version; `HTTP/2` falls back to HTTP/1.1 when the server does not negotiate h2. */
export type HttpVersion = 'HTTP/1.1' | 'HTTP/2';

/** Accepted protocol versions. */
export const HTTP_VERSIONS: readonly HttpVersion[] = ['HTTP/1.1', 'HTTP/2'];

/** Header name to ordered values. */
export type HeaderMultimap = ReadonlyMap<string, readonly string[]>;

/** Query parameter name to ordered values, in insertion order. */
export type QueryParameters = ReadonlyMap<string, readonly string[]>;

/** Transport settings taken from the client configuration when the client is built. */
export interface TransportOptions {
  /** Connect timeout in milliseconds. */
  connectTimeout: number;
  /** Redirect handling. */
  redirectPolicy: RedirectPolicy;
  /** Preferred protocol version. */
  httpVersion: HttpVersion;
}

/** A single fully assembled request handed to the transport. */
export interface TransportRequest {
  method: HttpMethod;
  /** Header lines in send order; a repeated name is sent once per entry. */
  headers: Array<[name: string, value: string]>;
  /** UTF-8 encoded body, or `null` for none. */
  body: Uint8Array | null;
  /** Aborts on timeout or client disposal. */
  signal: AbortSignal | null;
}

/** Outcome of a completed round trip, with the body fully read. */
export interface TransportResponse {
  status: number;
  headers: HeaderMultimap;
  /** UTF-8 decoded body. */
  body: string;
  /** URI the final response was received from. */
  url: string;
}

/** Contract for HTTP transports used by `RestClient`. */
export interface FetchClientProviderDefinition {
  /** Performs the round trip; transport failures are returned, never thrown. */
  request: (url: string, request: TransportRequest) => SafeWrapAsync<Error, TransportResponse>;
  /** Releases pooled connections. */
  dispose?: () => Promise<void>;
}

/** Factory signature for constructing HTTP transports. */
export interface FetchClientProvider {
  new (opts: TransportOptions): FetchClientProviderDefinition;
}
