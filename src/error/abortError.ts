import { isErrorType } from './isErrorType.js';

/**
 * Error used as the abort reason when a pending call is canceled.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, also matching DOM `AbortError` exceptions raised by `fetch`.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
