import type { HttpMethod } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request the transport could not complete: refused or reset
 * connections, DNS and TLS failures, timeouts and interruptions.
 *
 * The underlying failure is kept as `cause`.
 */
export class RestClientError extends Error {
  /** RestClientError error-name */
  static override name = 'RestClientError';
  /** Internal method of the failed request */
  #method: HttpMethod;
  /** Internal URI of the failed request */
  #uri: string;

  /** Creates a new instance of a RestClientError for the failed method + URI */
  constructor(message: string, method: HttpMethod, uri: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#method = method;
    this.#uri = uri;
  }

  /** Method of the failed request */
  get method(): HttpMethod {
    return this.#method;
  }

  /** URI of the failed request */
  get uri(): string {
    return this.#uri;
  }
}

/**
 * Type guard for {@link RestClientError}.
 */
export function isRestClientError(error: unknown): error is RestClientError {
  return isErrorType(RestClientError, error);
}

/**
 * Extract a {@link RestClientError} from an unknown error value, following nested causes.
 */
export function getRestClientError(error: unknown): null | RestClientError {
  return unwrapErrorType(RestClientError, error);
}
