import { ArgumentError } from '../error/argumentError.js';

/**
 * Throws an {@link ArgumentError} unless `value` is a string.
 * Empty strings pass; only absent or non-string values are rejected.
 */
export function requireString(value: unknown, argument: string): string {
  if (typeof value !== 'string') {
    throw new ArgumentError(`${argument} is required`, argument);
  }

  return value;
}

/**
 * Throws an {@link ArgumentError} unless `value` is a finite, positive number of milliseconds.
 */
export function requireDuration(value: unknown, argument: string): number {
  if (value === null || value === undefined) {
    throw new ArgumentError(`${argument} is required`, argument);
  }

  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ArgumentError(`${argument} must be a positive number of milliseconds, got ${String(value)}`, argument);
  }

  return value;
}

/**
 * Like {@link requireDuration}, but `null` clears the value.
 */
export function optionalDuration(value: unknown, argument: string): number | null {
  if (value === null) {
    return null;
  }

  return requireDuration(value, argument);
}

/**
 * Throws an {@link ArgumentError} unless `value` is one of `allowed`.
 */
export function requireOneOf<T extends string>(value: unknown, allowed: readonly T[], argument: string): T {
  if (value === null || value === undefined) {
    throw new ArgumentError(`${argument} is required`, argument);
  }

  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ArgumentError(`${argument} must be one of ${allowed.join(', ')}, got ${String(value)}`, argument);
  }

  return match;
}

/**
 * Throws an {@link ArgumentError} unless `value` is a plain string record, returning its entries.
 */
export function requireEntries(value: unknown, argument: string): Array<[string, unknown]> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ArgumentError(`${argument} is required`, argument);
  }

  return Object.entries(value);
}
