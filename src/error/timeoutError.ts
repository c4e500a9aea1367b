import { isErrorType } from './isErrorType.js';

/**
 * Error raised by the fetch transport when a request outlives its timeout.
 * Surfaces to callers as the cause of a `transport` failure.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
