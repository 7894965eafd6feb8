import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a missing or malformed argument.
 *
 * Builders throw it from the offending setter; the dispatcher returns it for a
 * bad method or path.
 */
export class ArgumentError extends Error {
  /** ArgumentError error-name */
  static override name = 'ArgumentError';
  /** Internal name of the offending argument */
  #argument: string;

  /** Creates a new instance of an ArgumentError for the named argument */
  constructor(message: string, argument: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#argument = argument;
  }

  /** Name of the offending argument */
  get argument(): string {
    return this.#argument;
  }
}

/**
 * Type guard for {@link ArgumentError}.
 */
export function isArgumentError(error: unknown): error is ArgumentError {
  return isErrorType(ArgumentError, error);
}

/**
 * Extract an {@link ArgumentError} from an unknown error value, following nested causes.
 */
export function getArgumentError(error: unknown): null | ArgumentError {
  return unwrapErrorType(ArgumentError, error);
}
