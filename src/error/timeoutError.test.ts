import { describe, expect, it } from 'vitest';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('exposes the elapsed timeout', () => {
    const err = new TimeoutError('timed out', 500);

    expect(err.timeout).toBe(500);
    expect(err.message).toBe('timed out');
  });
});

describe('isTimeoutError', () => {
  it('returns true for instances of TimeoutError', () => {
    const err = new TimeoutError('timed out', 500);
    expect(isTimeoutError(err)).toBe(true);
  });

  it('returns false for non TimeoutError errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});

describe('getTimeoutError', () => {
  it('unwraps nested causes', () => {
    const err = new TimeoutError('timed out', 500);

    expect(getTimeoutError(new Error('outer', { cause: err }))).toBe(err);
  });

  it('returns null when no TimeoutError exists', () => {
    expect(getTimeoutError(new Error('outer'))).toBeNull();
  });
});
