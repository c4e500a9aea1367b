import { isErrorType } from './isErrorType.js';

/**
 * Error raised by the `immediate` stub when a resource has no sample data to serve.
 */
export class MissingSampleDataError extends Error {
  /** MissingSampleDataError error-name */
  static name = 'MissingSampleDataError';
  /** Path of the resource lacking sample data */
  #path: string;

  /** Creates a new MissingSampleDataError naming the resource path */
  constructor(path: string, opts?: ErrorOptions) {
    super(`error missing sample data for ${path}`, opts);
    this.#path = path;
  }

  /** Path of the resource lacking sample data */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link MissingSampleDataError}.
 */
export function isMissingSampleDataError(error: unknown): error is MissingSampleDataError {
  return isErrorType(MissingSampleDataError, error);
}
