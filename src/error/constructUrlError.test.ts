import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
import { RestClientError } from './restClientError.js';

function unresolvable() {
  return new ConstructURLError("error resolving URI for path '/relative'", '/relative', {
    cause: new TypeError('Invalid URL'),
  });
}

describe('ConstructURLError', () => {
  it('keeps the path as given and the parse failure as cause', () => {
    const err = unresolvable();

    expect(err.url).toBe('/relative');
    expect(err.message).toBe("error resolving URI for path '/relative'");
    expect(err.cause).toEqual(new TypeError('Invalid URL'));
    expect(isConstructURLError(err)).toBe(true);
  });

  it('is not a RestClientError', () => {
    expect(isConstructURLError(new RestClientError('I/O error', 'GET', 'http://localhost:8080/'))).toBe(false);
  });
});

describe('getConstructURLError', () => {
  it('finds the error behind a RestClientError', () => {
    const err = unresolvable();
    const wrapped = new RestClientError('I/O error while invoking GET /relative', 'GET', '/relative', { cause: err });

    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('finds the error two causes deep', () => {
    const err = unresolvable();

    expect(getConstructURLError(new Error('outer', { cause: new Error('middle', { cause: err }) }))).toBe(err);
  });

  it('returns null for a chain without one', () => {
    expect(getConstructURLError(new Error('outer', { cause: new TypeError('Invalid URL') }))).toBeNull();
    expect(getConstructURLError('/relative')).toBeNull();
  });
});
