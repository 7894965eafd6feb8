import { describe, expect, it } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}

class CustomOtherError extends Error {}

class DifferentError extends Error {}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(CustomError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(CustomError, 'CustomError')).toBeNull();
    expect(unwrapErrorType(CustomError, undefined)).toBeNull();
  });

  it('unwrap simplest layer', () => {
    const err = new CustomError('test');

    expect(unwrapErrorType(CustomError, err)).toBe(err);
  });

  it('unwrap 7 layers', () => {
    const err = new CustomError('test');
    let wrapped: Error = err;
    for (let layer = 1; layer <= 7; layer++) {
      wrapped = new Error(`err${layer}`, { cause: wrapped });
    }

    expect(unwrapErrorType(CustomError, wrapped)).toBe(err);
  });

  it('returns the outermost match', () => {
    const inner = new CustomError('inner');
    const outer = new CustomError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(CustomError, outer)).toBe(outer);
  });

  it('skips other error types on the way', () => {
    const err = new CustomError('test', { cause: new Error('first') });
    const wrapped = new Error('err3', { cause: new CustomOtherError('err2', { cause: new Error('err1', { cause: err }) }) });

    expect(unwrapErrorType(CustomError, wrapped)).toBe(err);
  });

  it('returns null when no error in the chain matches', () => {
    const err = new DifferentError('err2', { cause: new Error('err1', { cause: new DifferentError('err') }) });

    expect(unwrapErrorType(CustomError, err)).toBeNull();
  });

  it('loses the type once an error is re-created from its message', () => {
    const err = new CustomError('message');
    const messageWrapped = new Error(err.message);

    expect(unwrapErrorType(CustomError, messageWrapped)).toBeNull();
  });
});
