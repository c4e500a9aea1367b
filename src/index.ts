/**
 * Root entrypoint: re-exports the client, resource descriptors, decoders, transport and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export {
  type CallOptions,
  type CancelableOperation,
  type ClientError,
  type ClientErrorType,
  type Completion,
  type Config,
  type ErrorMap,
  identityErrorMap,
  type Logger,
  noopOperation,
  RequestClient,
  type RequestClientProps,
  type StubBehavior,
} from './core/index.js';

export {
  type Decoder,
  JsonDecoder,
  type JsonDecoderOptions,
  type ParseFunction,
  parseJson,
  parseNothing,
  parseText,
  validateSync,
} from './decode/index.js';

export * from './error/index.js';

export { FetchTransport, type FetchTransportOptions, mergeHeaderOptions } from './fetch/index.js';

export {
  type AnyResource,
  type DecodedValue,
  type HeaderCombine,
  type HeaderMap,
  type HttpMethod,
  type HttpMethodName,
  isSuccessStatus,
  methodBody,
  type PathConvertible,
  type PathLike,
  type RequestBody,
  Resource,
  type ResourceProps,
  type StatusPredicate,
  toPathString,
} from './resource/index.js';

/** Request and transport contracts, for custom transports. */
export type { HeaderOptions, HttpRequest, Transport, TransportOptions, TransportResponse } from './types/request.js';

/** Error-first tuple helpers. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';
