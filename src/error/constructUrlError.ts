import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Thrown when a base URL and resource path cannot form a valid URL.
 *
 * This is a programming error rather than a runtime failure, so it is thrown
 * straight away and never passed through a client's `errorMap`.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  /** The URL string that failed to parse */
  #url: string;

  /** Creates a new ConstructURLError for the rejected URL string */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** The URL string that failed to parse */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
