import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard checking whether `err`, or any error in its `cause` chain,
 * is an instance of `errorClass`.
 */
export function isErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
