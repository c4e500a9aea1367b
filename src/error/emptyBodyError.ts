import { isErrorType } from './isErrorType.js';

/**
 * Error representing an accepted response that should have carried a body but did not.
 */
export class EmptyBodyError extends Error {
  /** EmptyBodyError error-name */
  static name = 'EmptyBodyError';
  /** Status code of the empty response */
  #status: number;

  /** Creates a new EmptyBodyError for the given status */
  constructor(status: number, message = `error empty body for status ${status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
  }

  /** Status code of the empty response */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link EmptyBodyError}.
 */
export function isEmptyBodyError(error: unknown): error is EmptyBodyError {
  return isErrorType(EmptyBodyError, error);
}
