import type { QueryParameters } from '../types/request.js';
import { optionalDuration, requireEntries, requireString } from '../utils/arguments.js';

/**
 * Immutable per-call options: query parameters, headers, body and timeout override.
 *
 * One instance may be reused across any number of calls. Options with nothing set
 * behave exactly like {@link RequestOptions.empty}.
 *
 * @example
 * const opts = RequestOptions.builder()
 *   .queryParam('page', '1')
 *   .header('X-Trace', 'trace-123')
 *   .build();
 */
export class RequestOptions {
  /** Query parameters, in insertion order, at least one value each. */
  #queryParameters: QueryParameters;
  /** Per-call headers, overriding client defaults of the same name. */
  #headers: ReadonlyMap<string, string>;
  /** Request body, only sent for POST, PUT and PATCH. */
  #body: string | null;
  /** Timeout override in milliseconds. */
  #timeout: number | null;

  private constructor(
    queryParameters: QueryParameters,
    headers: ReadonlyMap<string, string>,
    body: string | null,
    timeout: number | null,
  ) {
    this.#queryParameters = queryParameters;
    this.#headers = headers;
    this.#body = body;
    this.#timeout = timeout;
  }

  /** Shared options value with nothing set. */
  static readonly #EMPTY = new RequestOptions(new Map(), new Map(), null, null);

  /** Returns the shared empty options singleton. */
  static empty(): RequestOptions {
    return RequestOptions.#EMPTY;
  }

  /** Starts a new {@link RequestOptionsBuilder}. */
  static builder(): RequestOptionsBuilder {
    return new RequestOptionsBuilder();
  }

  /** @internal Used by {@link RequestOptionsBuilder.build}. */
  static create(
    queryParameters: QueryParameters,
    headers: ReadonlyMap<string, string>,
    body: string | null,
    timeout: number | null,
  ): RequestOptions {
    if (queryParameters.size === 0 && headers.size === 0 && body === null && timeout === null) {
      return RequestOptions.#EMPTY;
    }

    return new RequestOptions(queryParameters, headers, body, timeout);
  }

  get queryParameters(): QueryParameters {
    return this.#queryParameters;
  }

  get headers(): ReadonlyMap<string, string> {
    return this.#headers;
  }

  get body(): string | null {
    return this.#body;
  }

  get timeout(): number | null {
    return this.#timeout;
  }
}

/**
 * Mutable accumulator producing {@link RequestOptions}.
 *
 * - `queryParam` appends: the same name twice keeps both values, in call order.
 * - `header` overwrites: the last value for a name wins.
 */
export class RequestOptionsBuilder {
  #queryParameters = new Map<string, string[]>();
  #headers = new Map<string, string>();
  #body: string | null = null;
  #timeout: number | null = null;

  queryParam(name: string, value: string): this {
    const key = requireString(name, 'Query parameter name');
    const item = requireString(value, 'Query parameter value');
    const values = this.#queryParameters.get(key);
    if (values) {
      values.push(item);
      return this;
    }

    this.#queryParameters.set(key, [item]);
    return this;
  }

  header(name: string, value: string): this {
    this.#headers.set(requireString(name, 'Header name'), requireString(value, 'Header value'));
    return this;
  }

  headers(headers: Readonly<Record<string, string>>): this {
    for (const [name, value] of requireEntries(headers, 'Headers map')) {
      this.header(name, requireString(value, 'Header value'));
    }

    return this;
  }

  /** Sets the body; `null` clears it. */
  body(body: string | null): this {
    this.#body = body === null ? null : requireString(body, 'Body');
    return this;
  }

  /** Sets the timeout override in milliseconds; `null` clears it. */
  timeout(timeout: number | null): this {
    this.#timeout = optionalDuration(timeout, 'Timeout');
    return this;
  }

  /** Snapshots the accumulated state; later builder calls do not affect the result. */
  build(): RequestOptions {
    const queryParameters = new Map<string, readonly string[]>();
    for (const [name, values] of this.#queryParameters) {
      queryParameters.set(name, Object.freeze([...values]));
    }

    return RequestOptions.create(queryParameters, new Map(this.#headers), this.#body, this.#timeout);
  }
}
