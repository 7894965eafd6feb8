import type { Logger } from 'pino';
import { ArgumentError } from '../error/argumentError.js';
import { FetchClient } from '../fetch/client.js';
import {
  type FetchClientProvider,
  HTTP_VERSIONS,
  type HttpVersion,
  REDIRECT_POLICIES,
  type RedirectPolicy,
} from '../types/request.js';
import { optionalDuration, requireDuration, requireEntries, requireOneOf, requireString } from '../utils/arguments.js';
import { DEFAULT_CONNECT_TIMEOUT } from '../utils/timeout.js';
import { safeWrap } from '../utils/wrap.js';
import { RestClient } from './client.js';
import type { ClientConfig } from './types.js';

/**
 * Fluent builder for {@link RestClient}.
 *
 * Setters validate eagerly and throw an {@link ArgumentError} on misuse; `build()` never fails.
 *
 * @example
 * const client = RestClient.builder()
 *   .baseUri('https://api.example.com/')
 *   .defaultHeader('Accept', 'application/json')
 *   .requestTimeout(2_000)
 *   .build();
 */
export class RestClientBuilder {
  #baseUri: string | null = null;
  #defaultHeaders = new Map<string, string>();
  #connectTimeout = DEFAULT_CONNECT_TIMEOUT;
  #requestTimeout: number | null = null;
  #redirectPolicy: RedirectPolicy = 'normal';
  #httpVersion: HttpVersion = 'HTTP/2';
  #fetchProvider: FetchClientProvider = FetchClient;
  #logger: Logger | undefined;

  /** Sets the absolute URI relative paths resolve against; `null` clears it. */
  baseUri(baseUri: string | null): this {
    if (baseUri === null) {
      this.#baseUri = null;
      return this;
    }

    const value = requireString(baseUri, 'Base URI');
    const [err, parsed] = safeWrap(() => new URL(value));
    if (err) {
      throw new ArgumentError(`Base URI must be an absolute URI, got '${value}'`, 'Base URI', { cause: err });
    }

    this.#baseUri = parsed.href;
    return this;
  }

  /** Connect timeout in milliseconds. */
  connectTimeout(timeout: number): this {
    this.#connectTimeout = requireDuration(timeout, 'Connect timeout');
    return this;
  }

  /** Client-wide request timeout in milliseconds; `null` falls back to 30 seconds. */
  requestTimeout(timeout: number | null): this {
    this.#requestTimeout = optionalDuration(timeout, 'Request timeout');
    return this;
  }

  /** Adds a header sent with every request; a later call with the same name wins. */
  defaultHeader(name: string, value: string): this {
    this.#defaultHeaders.set(requireString(name, 'Header name'), requireString(value, 'Header value'));
    return this;
  }

  defaultHeaders(headers: Readonly<Record<string, string>>): this {
    for (const [name, value] of requireEntries(headers, 'Headers map')) {
      this.defaultHeader(name, requireString(value, 'Header value'));
    }

    return this;
  }

  httpVersion(version: HttpVersion): this {
    this.#httpVersion = requireOneOf(version, HTTP_VERSIONS, 'HTTP version');
    return this;
  }

  redirectPolicy(policy: RedirectPolicy): this {
    this.#redirectPolicy = requireOneOf(policy, REDIRECT_POLICIES, 'Redirect policy');
    return this;
  }

  /** Replaces the default `undici` transport. */
  fetchProvider(provider: FetchClientProvider): this {
    if (typeof provider !== 'function') {
      throw new ArgumentError('Fetch provider is required', 'Fetch provider');
    }

    this.#fetchProvider = provider;
    return this;
  }

  /** Receives the client's debug records. */
  logger(logger: Logger): this {
    if (typeof logger !== 'object' || logger === null) {
      throw new ArgumentError('Logger is required', 'Logger');
    }

    this.#logger = logger;
    return this;
  }

  /** Freezes the configuration and creates the client, along with its transport. */
  build(): RestClient {
    const config: ClientConfig = Object.freeze({
      baseUri: this.#baseUri,
      defaultHeaders: new Map(this.#defaultHeaders),
      connectTimeout: this.#connectTimeout,
      requestTimeout: this.#requestTimeout,
      redirectPolicy: this.#redirectPolicy,
      httpVersion: this.#httpVersion,
    });

    return new RestClient({ config, fetchProvider: this.#fetchProvider, logger: this.#logger });
  }
}
