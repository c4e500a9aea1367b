/**
 * Error entrypoint: error classes raised by the client and helpers for identifying them in `cause` chains.
 * @module
 */

/** Abort reason of canceled calls, and its type guard. */
export { AbortError, isAbortError } from './abortError.js';
/** Thrown when base URL and path do not form a valid URL. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Bytes that could not be decoded into the resource's value type. */
export { DecodeError, type DecodeErrorKind, getDecodeError, isDecodeError } from './decodeError.js';
/** Accepted status without the body it should carry. */
export { EmptyBodyError, isEmptyBodyError } from './emptyBodyError.js';
/** Status code rejected by the resource. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Raised by the `immediate` stub when a resource has no sample data. */
export { isMissingSampleDataError, MissingSampleDataError } from './missingSampleDataError.js';
/** Raised by the fetch transport when a request exceeds its timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
