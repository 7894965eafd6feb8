import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HeaderMultimap } from '../types/request.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

/**
 * Immutable outcome of a completed call: status, headers, fully read body and the
 * URI the response came from. Any status is a response, including 4xx and 5xx.
 */
export class RestResponse {
  #statusCode: number;
  #headers: HeaderMultimap;
  #body: string;
  #uri: string;

  constructor(statusCode: number, headers: HeaderMultimap, body: string, uri: string) {
    this.#statusCode = statusCode;
    this.#headers = headers;
    this.#body = body;
    this.#uri = uri;
  }

  get statusCode(): number {
    return this.#statusCode;
  }

  /** Header names as received from the transport, values in received order. */
  get headers(): HeaderMultimap {
    return this.#headers;
  }

  get body(): string {
    return this.#body;
  }

  /** Final URI, after any redirect the transport followed. */
  get uri(): string {
    return this.#uri;
  }

  /**
   * First value of the header `name`, or `null` when absent.
   * An exact name match wins; otherwise names compare case-insensitively.
   */
  header(name: string | null): string | null {
    if (!name) {
      return null;
    }

    const exact = this.#headers.get(name);
    if (exact !== undefined) {
      return exact[0] ?? null;
    }

    const wanted = name.toLowerCase();
    for (const [key, values] of this.#headers) {
      if (key.toLowerCase() === wanted) {
        return values[0] ?? null;
      }
    }

    return null;
  }

  /** `true` for a 2xx status. */
  isSuccessful(): boolean {
    return this.#statusCode >= 200 && this.#statusCode < 300;
  }

  /**
   * Parses the body as JSON, optionally validating it against a Standard Schema.
   * An empty body parses to `null`.
   *
   * @example
   * const [err, user] = await response.json(z.object({ id: z.number() }));
   */
  json(): SafeWrapAsync<Error, unknown>;
  json<Output>(schema: StandardSchemaV1<unknown, Output>): SafeWrapAsync<Error, Output>;
  async json(schema?: StandardSchemaV1): SafeWrapAsync<Error, unknown> {
    const [err, data] = safeWrap((): unknown => (this.#body === '' ? null : JSON.parse(this.#body)));
    if (err) {
      return [new Error('error parsing json response body', { cause: err }), null];
    }

    if (!schema) {
      return [null, data];
    }

    return validator(data, schema);
  }
}
