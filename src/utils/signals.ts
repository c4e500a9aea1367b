import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Signal aborting after a delay, with a handle to cancel the pending timer. */
export interface TimeoutSignal {
  /** Aborts with a {@link TimeoutError} once the delay passes */
  signal: AbortSignal;
  /** Clears the timer; the signal then never aborts */
  clear: () => void;
}

/**
 * Creates a {@link TimeoutSignal} that aborts after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or omitted, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts as soon as any source aborts, keeping its `reason`
 *   (or an {@link AbortError} when the source has none).
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0];
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', () => {
    for (const remove of listeners) {
      remove();
    }
  });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}
