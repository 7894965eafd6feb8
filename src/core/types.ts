import type { Logger } from 'pino';
import type { ArgumentError } from '../error/argumentError.js';
import type { ConstructURLError } from '../error/constructUrlError.js';
import type { RestClientError } from '../error/restClientError.js';
import type { FetchClientProvider, HttpVersion, RedirectPolicy } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { RestResponse } from './response.js';

/**
 * Immutable client-wide settings, created once by the builder and shared by every
 * request the client issues.
 */
export interface ClientConfig {
  /** Absolute URI that relative paths resolve against, or `null`. */
  readonly baseUri: string | null;
  /** Headers sent with every request; names are case-sensitive, insertion ordered. */
  readonly defaultHeaders: ReadonlyMap<string, string>;
  /** Connect timeout in milliseconds. */
  readonly connectTimeout: number;
  /** Client-wide request timeout in milliseconds, or `null` for the 30s fallback. */
  readonly requestTimeout: number | null;
  readonly redirectPolicy: RedirectPolicy;
  readonly httpVersion: HttpVersion;
}

/** Constructor options accepted by `RestClient`. */
export interface RestClientProps {
  config: ClientConfig;
  /** HTTP transport. Defaults to `FetchClient`. */
  fetchProvider?: FetchClientProvider;
  /** Receives debug records. Defaults to a silent pino logger. */
  logger?: Logger;
}

/** Every failure a dispatch can return. */
export type RestClientFailure = ArgumentError | ConstructURLError | RestClientError;

/** Result of a dispatch: `[failure, null]` or `[null, response]`. */
export type RestResult = SafeWrapAsync<RestClientFailure, RestResponse>;
