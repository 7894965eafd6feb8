import { Agent, type Dispatcher, request as undiciRequest } from 'undici';
import type {
  FetchClientProviderDefinition,
  HttpMethod,
  RedirectPolicy,
  TransportOptions,
  TransportRequest,
  TransportResponse,
} from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { toHeaderMultimap } from './utils.js';

/** Statuses whose `Location` header is followed. */
const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/** Request headers not forwarded when a redirect leaves the origin. */
const CREDENTIAL_HEADERS: ReadonlySet<string> = new Set(['authorization', 'cookie', 'proxy-authorization']);

/** Redirects followed for one request before giving up. */
export const MAX_REDIRECTS = 5;

/**
 * Default transport backed by `undici`.
 *
 * - Pools connections in one {@link Agent} per client, configured with the connect timeout
 *   and, for `HTTP/2`, h2 negotiation with HTTP/1.1 fallback.
 * - Dispatches through `undici`'s `request`, whose parsed headers keep one value per header line.
 * - Follows redirects itself so the {@link RedirectPolicy} can be enforced per hop.
 * - Returns error-first tuples via {@link SafeWrapAsync}; nothing is thrown.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Connection pool shared by all requests of the owning client. */
  #agent: Agent;
  /** Redirect handling for every request. */
  #redirectPolicy: RedirectPolicy;
  /** Pending close, so repeated dispose calls share one. */
  #closing: Promise<void> | null = null;

  constructor(opts: TransportOptions) {
    this.#agent = new Agent({
      connect: { timeout: opts.connectTimeout },
      allowH2: opts.httpVersion === 'HTTP/2',
    });
    this.#redirectPolicy = opts.redirectPolicy;
  }

  /**
   * Performs the round trip for `url`, following redirects as the policy allows,
   * and reads the final response body as text.
   *
   * Redirect hops rewrite the method the way browsers do: 303 turns anything but HEAD into
   * a body-less GET, 301 and 302 turn POST into a body-less GET, 307 and 308 keep both.
   * Credentials are not sent on to another origin.
   */
  async request(url: string, request: TransportRequest): SafeWrapAsync<Error, TransportResponse> {
    let currentUrl = url;
    let method = request.method;
    let body = request.body;
    let headers = request.headers;

    for (let redirects = 0; ; redirects++) {
      const [err, response] = await safeWrapAsync(() =>
        undiciRequest(currentUrl, {
          method,
          headers: headers.flat(),
          body,
          signal: request.signal,
          dispatcher: this.#agent,
        }),
      );
      if (err) {
        return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
      }

      const [errTarget, target] = this.#redirectTarget(currentUrl, response);
      if (errTarget) {
        return [errTarget, null];
      }

      if (target === null) {
        return this.#readResponse(method, currentUrl, response);
      }

      const [errDrain] = await safeWrapAsync(() => response.body.dump());
      if (errDrain) {
        return [new Error(`error reading ${method} redirect body in fetchClient`, { cause: errDrain }), null];
      }

      if (redirects >= MAX_REDIRECTS) {
        return [new Error(`error too many redirects, last redirect from ${currentUrl}`), null];
      }

      const status = response.statusCode;
      if ((status === 303 && method !== 'HEAD') || ((status === 301 || status === 302) && method === 'POST')) {
        method = 'GET';
        body = null;
      }

      if (new URL(target).origin !== new URL(currentUrl).origin) {
        headers = headers.filter(([name]) => !CREDENTIAL_HEADERS.has(name.toLowerCase()));
      }

      currentUrl = target;
    }
  }

  /** Closes the agent and every pooled connection. */
  dispose(): Promise<void> {
    this.#closing ??= this.#agent.close();
    return this.#closing;
  }

  /**
   * Resolves where a response redirects to, or `null` when it is final under the policy.
   * An unparsable `Location` is an error.
   */
  #redirectTarget(currentUrl: string, response: Dispatcher.ResponseData): SafeWrap<Error, string | null> {
    if (this.#redirectPolicy === 'never' || !REDIRECT_STATUSES.has(response.statusCode)) {
      return [null, null];
    }

    const header: string | string[] | undefined = response.headers.location;
    const location = Array.isArray(header) ? header[0] : header;
    if (location === undefined) {
      return [null, null];
    }

    const [err, target] = safeWrap(() => new URL(location, currentUrl));
    if (err) {
      return [new Error(`error resolving redirect location '${location}' from ${currentUrl}`, { cause: err }), null];
    }

    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      return [null, null];
    }

    if (this.#redirectPolicy === 'normal' && new URL(currentUrl).protocol === 'https:' && target.protocol === 'http:') {
      return [null, null];
    }

    return [null, target.href];
  }

  async #readResponse(
    method: HttpMethod,
    url: string,
    response: Dispatcher.ResponseData,
  ): SafeWrapAsync<Error, TransportResponse> {
    const [err, body] = await safeWrapAsync(() => response.body.text());
    if (err) {
      return [new Error(`error reading ${method} response body in fetchClient`, { cause: err }), null];
    }

    return [null, { status: response.statusCode, headers: toHeaderMultimap(response.headers), body, url }];
  }
}
