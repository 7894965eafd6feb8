/**
 * Error entrypoint: exports the client's error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the core client.
 * @module
 */

export { AbortError, getAbortError, isAbortError } from './abortError.js';
export { ArgumentError, getArgumentError, isArgumentError } from './argumentError.js';
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Generic type guard that matches an error constructor anywhere in a cause chain. */
export { isErrorType } from './isErrorType.js';
export { getRestClientError, isRestClientError, RestClientError } from './restClientError.js';
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Returns the first error of a given class in a cause chain, or `null`. */
export { unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
