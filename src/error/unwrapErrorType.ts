/**
 * Walks an error and its `cause` chain, returning the first link that is an
 * instance of `errorClass`.
 */
export function unwrapErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
