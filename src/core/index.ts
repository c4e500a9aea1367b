/**
 * Core entrypoint: the typed request client, its pipeline and the types it speaks.
 * Import from here if you only need the client without the resource and decode helpers.
 * @module
 */

/**
 * Typed HTTP client running every resource through stub substitution, request construction,
 * response validation, decoding and error normalization. Callable with a callback,
 * as a promise, or as a single-value async iterable.
 *
 * @typeParam E - Error type produced by the client's error map.
 */
export { RequestClient, noopOperation } from './client.js';

/** Constructor props, runtime config, call options and completion callback of {@link RequestClient}. */
export type { CallOptions, Completion, Config, RequestClientProps } from './client.js';

/** Failure classification, error map and stub behaviors. */
export type {
  CancelableOperation,
  ClientError,
  ClientErrorType,
  ErrorMap,
  Logger,
  Resolution,
  StubBehavior,
} from './types.js';

/** Error map returning the {@link ClientError} unchanged. */
export { identityErrorMap } from './errorMap.js';

/** Pure pipeline steps shared by every calling convention. */
export { decodeBody, type Failure, normalize, resolveStub, type Settled, settleResponse } from './pipeline.js';
