import { BODILESS_METHODS, type HttpMethod } from '../types/request.js';

const encoder = new TextEncoder();

/**
 * Selects the bytes sent for `method`.
 *
 * GET, DELETE, HEAD and OPTIONS never carry a payload, so any body set on the
 * options is dropped for them. POST, PUT and PATCH send the body UTF-8 encoded.
 * Raw bytes keep the transport from adding a content type of its own.
 */
export function createRequestBody(method: HttpMethod, body: string | null): Uint8Array | null {
  if (BODILESS_METHODS.has(method) || body === null) {
    return null;
  }

  return encoder.encode(body);
}
