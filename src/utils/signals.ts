import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * An abort signal together with the function releasing the timers and listeners
 * backing it. Call `release` once the guarded work settles.
 */
export interface ScopedSignal {
  signal: AbortSignal;
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * @param timeoutMs - Timeout in milliseconds.
 */
export function createTimeoutSignal(timeoutMs: number): ScopedSignal {
  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    release: () => clearTimeout(timeout),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts as soon as any source aborts, carrying that
 *   source's `reason`, or an {@link AbortError} when it has none.
 *
 * `release` detaches the listeners added to the sources, so long-lived sources
 * do not accumulate them.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], release: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
