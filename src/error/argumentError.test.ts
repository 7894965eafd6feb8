import { describe, expect, it } from 'vitest';
import { ArgumentError, getArgumentError, isArgumentError } from './argumentError.js';

describe('ArgumentError', () => {
  it('exposes the argument name', () => {
    const err = new ArgumentError('Header name is required', 'Header name');

    expect(err.argument).toBe('Header name');
    expect(err.message).toBe('Header name is required');
  });
});

describe('isArgumentError', () => {
  it('returns true for instances of ArgumentError', () => {
    expect(isArgumentError(new ArgumentError('Path is required', 'Path'))).toBe(true);
  });

  it('returns false for other errors', () => {
    expect(isArgumentError(new TypeError('Path is required'))).toBe(false);
  });
});

describe('getArgumentError', () => {
  it('unwraps nested causes', () => {
    const err = new ArgumentError('Path is required', 'Path');

    expect(getArgumentError(new Error('outer', { cause: err }))).toBe(err);
  });
});
