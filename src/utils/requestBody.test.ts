import { describe, expect, it } from 'vitest';
import type { HttpMethod } from '../types/request.js';
import { createRequestBody } from './requestBody.js';

describe('createRequestBody', () => {
  it.each<HttpMethod>(['GET', 'DELETE', 'HEAD', 'OPTIONS'])('sends no body for %s even when one is set', (method) => {
    expect(createRequestBody(method, '{"ignored":true}')).toBeNull();
  });

  it.each<HttpMethod>(['POST', 'PUT', 'PATCH'])('sends the UTF-8 bytes of the body for %s', (method) => {
    const body = createRequestBody(method, '{"message":"Héllo"}');

    expect(body).toEqual(new Uint8Array(Buffer.from('{"message":"Héllo"}', 'utf8')));
    expect(new TextDecoder().decode(body ?? new Uint8Array())).toBe('{"message":"Héllo"}');
  });

  it('encodes characters outside ASCII as multi-byte UTF-8', () => {
    const body = createRequestBody('PUT', '{"msg":"héllo ✓"}');

    expect(body).toHaveLength(20);
    expect(Buffer.from(body ?? new Uint8Array()).toString('hex')).toBe('7b226d7367223a2268c3a96c6c6f20e29c93227d');
  });

  it.each<HttpMethod>(['POST', 'PUT', 'PATCH'])('sends no body for %s without one', (method) => {
    expect(createRequestBody(method, null)).toBeNull();
  });

  it('sends an empty payload for an empty string body', () => {
    expect(createRequestBody('POST', '')).toEqual(new Uint8Array());
  });
});
