import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)`, which may be sync or async.
 * - A throwing validator is wrapped in a `ValidationError` with no issues and the thrown value as cause.
 * - A result with `issues` becomes a `ValidationError` carrying those issues.
 * - Otherwise resolves to `[null, result.value]`.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<ValidationError, Output> {
  const [err, pending] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error starting schema validation', [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(async () => pending);
  if (errAsync) {
    return [new ValidationError('error in async schema validation', [], { cause: errAsync }), null];
  }

  if (typeof result !== 'object' || result === null) {
    return [new ValidationError('error schema validation returned no result', []), null];
  }

  if (result.issues !== undefined) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
