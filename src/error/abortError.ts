import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error used as the abort reason when a client is disposed while requests are in flight.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}

/**
 * Extract an {@link AbortError} from an unknown error value, following nested causes.
 */
export function getAbortError(error: unknown): null | AbortError {
  return unwrapErrorType(AbortError, error);
}
