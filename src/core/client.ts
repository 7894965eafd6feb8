import { type Logger, pino } from 'pino';
import { AbortError, getAbortError } from '../error/abortError.js';
import { ArgumentError } from '../error/argumentError.js';
import { RestClientError } from '../error/restClientError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaders } from '../fetch/utils.js';
import {
  type FetchClientProviderDefinition,
  type HttpMethod,
  isHttpMethod,
  type TransportRequest,
  type TransportResponse,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { createRequestBody } from '../utils/requestBody.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { resolveTimeout } from '../utils/timeout.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { RestClientBuilder } from './builder.js';
import { RequestOptions } from './options.js';
import { RestResponse } from './response.js';
import type { ClientConfig, RestClientProps, RestResult } from './types.js';

/**
 * REST client that:
 * - resolves paths against the configured base URI and merges query parameters,
 * - sends default and per-request headers, dropping bodies for GET, DELETE, HEAD and OPTIONS,
 * - bounds every call by its effective timeout,
 * - returns the fully read response, whatever its status.
 *
 * All calls return error-first tuples via {@link SafeWrapAsync}; nothing is thrown.
 * Instances are safe to share between concurrent calls.
 */
export class RestClient {
  /** Frozen configuration shared by every request. */
  #config: ClientConfig;
  /** Underlying HTTP transport. */
  #fetchClient: FetchClientProviderDefinition;
  /** Receives debug records. */
  #logger: Logger;
  /** Aborted by {@link RestClient.dispose}, interrupting in-flight calls. */
  #abortController = new AbortController();
  /** Pending disposal, shared by repeated calls. */
  #disposing: Promise<void> | null = null;

  /**
   * Creates a client and its transport. Prefer {@link RestClient.builder}, which validates
   * and freezes the configuration.
   */
  constructor({ config, fetchProvider = FetchClient, logger = pino({ level: 'silent' }) }: RestClientProps) {
    this.#config = config;
    this.#logger = logger;
    this.#fetchClient = new fetchProvider({
      connectTimeout: config.connectTimeout,
      redirectPolicy: config.redirectPolicy,
      httpVersion: config.httpVersion,
    });

    this.#logger.debug(
      {
        baseUri: config.baseUri,
        connectTimeout: config.connectTimeout,
        requestTimeout: config.requestTimeout,
        redirectPolicy: config.redirectPolicy,
        httpVersion: config.httpVersion,
        defaultHeaders: [...config.defaultHeaders.keys()],
      },
      'client initialized',
    );
  }

  /** Starts a new {@link RestClientBuilder}. */
  static builder(): RestClientBuilder {
    return new RestClientBuilder();
  }

  get config(): ClientConfig {
    return this.#config;
  }

  get(path: string, options?: RequestOptions | null): RestResult {
    return this.send('GET', path, options);
  }

  post(path: string, options?: RequestOptions | null): RestResult {
    return this.send('POST', path, options);
  }

  put(path: string, options?: RequestOptions | null): RestResult {
    return this.send('PUT', path, options);
  }

  patch(path: string, options?: RequestOptions | null): RestResult {
    return this.send('PATCH', path, options);
  }

  delete(path: string, options?: RequestOptions | null): RestResult {
    return this.send('DELETE', path, options);
  }

  head(path: string, options?: RequestOptions | null): RestResult {
    return this.send('HEAD', path, options);
  }

  options(path: string, options?: RequestOptions | null): RestResult {
    return this.send('OPTIONS', path, options);
  }

  /**
   * Performs one call and waits for the whole response body.
   *
   * Failures:
   * - {@link ArgumentError} for an unknown method or a missing path.
   * - `ConstructURLError` when no valid `http:`/`https:` URI can be built.
   * - {@link RestClientError} for any transport failure, with the cause attached:
   *   a `TimeoutError` when the effective timeout fired, an {@link AbortError} when the
   *   client was disposed.
   *
   * A 4xx or 5xx status is a normal response.
   *
   * @param method - HTTP method, upper case.
   * @param path - Path relative to the base URI, or an absolute URI.
   * @param options - Per-call options; defaults to {@link RequestOptions.empty}.
   */
  async send(method: HttpMethod, path: string, options?: RequestOptions | null): RestResult {
    if (!isHttpMethod(method)) {
      return [new ArgumentError(`Method must be one of GET, POST, PUT, PATCH, DELETE, HEAD, OPTIONS`, 'Method'), null];
    }

    if (typeof path !== 'string') {
      return [new ArgumentError('Path is required', 'Path'), null];
    }

    const opts = options ?? RequestOptions.empty();
    const [errUrl, uri] = constructUrl(this.#config.baseUri, path, opts.queryParameters);
    if (errUrl) {
      return [errUrl, null];
    }

    if (this.#abortController.signal.aborted) {
      return [
        new RestClientError(`request interrupted while invoking ${method} ${uri}`, method, uri, {
          cause: this.#abortController.signal.reason,
        }),
        null,
      ];
    }

    const timeout = resolveTimeout(opts.timeout, this.#config.requestTimeout);
    const timeoutSignal = createTimeoutSignal(timeout);
    const signal = mergeSignals([timeoutSignal.signal, this.#abortController.signal]) ?? timeoutSignal;

    this.#logger.debug({ method, uri, timeout }, 'dispatching request');
    const startedAt = Date.now();

    const [err, response] = await this.#dispatch(uri, {
      method,
      headers: mergeHeaders(this.#config.defaultHeaders, opts.headers),
      body: createRequestBody(method, opts.body),
      signal: signal.signal,
    });

    timeoutSignal.release();
    signal.release();

    if (err) {
      const interrupted = this.#abortController.signal.aborted || getAbortError(err) !== null;
      this.#logger.debug({ method, uri, err }, 'request failed');

      const message = interrupted
        ? `request interrupted while invoking ${method} ${uri}`
        : `I/O error while invoking ${method} ${uri}`;
      return [new RestClientError(message, method, uri, { cause: err }), null];
    }

    this.#logger.debug(
      { method, uri: response.url, statusCode: response.status, durationMs: Date.now() - startedAt },
      'received response',
    );

    return [null, new RestResponse(response.status, response.headers, response.body, response.url)];
  }

  /**
   * Interrupts every in-flight call and closes the transport. Later calls fail with an
   * interruption {@link RestClientError}. Repeated calls share the first disposal.
   */
  dispose(): Promise<void> {
    this.#disposing ??= this.#close();
    return this.#disposing;
  }

  async #close(): Promise<void> {
    this.#abortController.abort(new AbortError('client was disposed'));
    await this.#fetchClient.dispose?.();
    this.#logger.debug('client disposed');
  }

  /** Calls the transport, folding a thrown failure into the returned tuple. */
  async #dispatch(uri: string, request: TransportRequest): SafeWrapAsync<Error, TransportResponse> {
    const [errThrown, outcome] = await safeWrapAsync(() => this.#fetchClient.request(uri, request));
    if (errThrown) {
      return [errThrown, null];
    }

    return outcome;
  }
}
