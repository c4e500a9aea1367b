import type { HttpMethodName, RequestBody } from '../resource/method.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header containers accepted by {@link mergeHeaderOptions}; a `null` value removes the key. */
export type HeaderOptions = Headers | [string, string][] | Record<string, string | null | undefined>;

/** Concrete request produced from a resource, ready for a {@link Transport}. */
export interface HttpRequest {
  /** Upper-case HTTP method */
  method: HttpMethodName;
  /** Absolute URL including the query string */
  url: string;
  /** Request headers, one value per key */
  headers: Headers;
  /** Body for POST/PUT/PATCH, otherwise `null` */
  body: RequestBody | null;
}

/** A complete response as delivered by a {@link Transport}. */
export interface TransportResponse {
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: Headers;
  /** Entire response body; empty when the response had none */
  body: Uint8Array;
}

/** Per-request options handed to {@link Transport.send}. */
export interface TransportOptions {
  /** Aborts the request; an aborted request resolves with an error. */
  signal?: AbortSignal;
}

/**
 * Asynchronous request executor used by the client.
 *
 * `send` resolves exactly once, with `[null, response]` for any response whatever its status,
 * or `[error, null]` when no response was obtained. It should not reject.
 */
export interface Transport {
  send(request: HttpRequest, opts?: TransportOptions): SafeWrapAsync<Error, TransportResponse>;
}
