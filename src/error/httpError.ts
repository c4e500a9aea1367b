import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response whose status code the resource does not accept.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';
  /** Rejected status code */
  #status: number;
  /** Body bytes returned alongside the rejected status */
  #body: Uint8Array;

  /** Creates a new HTTPError for the rejected status, defaulting the message to include it */
  constructor(status: number, body: Uint8Array, message = `HTTP Error: ${status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
    this.#body = body;
  }

  /** Rejected status code */
  get status(): number {
    return this.#status;
  }

  /** Body bytes returned alongside the rejected status */
  get body(): Uint8Array {
    return this.#body;
  }
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}
