import type { DecodeError } from '../error/decodeError.js';
import type { EmptyBodyError } from '../error/emptyBodyError.js';
import type { HTTPError } from '../error/httpError.js';
import type { MissingSampleDataError } from '../error/missingSampleDataError.js';
import type { AnyResource } from '../resource/resource.js';

/**
 * Closed set of failures the client can produce. Every variant carries an `Error`
 * so a caller's error map can render it or keep it as a cause.
 *
 * - `transport`: no response was obtained (network failure, abort, timeout).
 * - `status`: the response status was rejected by the resource.
 * - `empty-body`: the status was accepted but the body, which it requires, was empty.
 * - `decode`: the body could not be decoded into the resource's value type.
 * - `missing-sample-data`: the `immediate` stub found no sample data on the resource.
 */
export type ClientError =
  | { type: 'transport'; error: Error }
  | { type: 'status'; status: number; error: HTTPError }
  | { type: 'empty-body'; status: number; error: EmptyBodyError }
  | { type: 'decode'; error: DecodeError }
  | { type: 'missing-sample-data'; path: string; error: MissingSampleDataError };

/** Discriminant of {@link ClientError}. */
export type ClientErrorType = ClientError['type'];

/**
 * Converts a {@link ClientError}, together with the raw body when one exists,
 * into the caller's error type. Applied exactly once per failed call.
 */
export type ErrorMap<E> = (error: ClientError, data: Uint8Array | null) => E;

/**
 * Short-circuits calls before any request is built or sent.
 *
 * - `immediate`: decode the resource's `sampleData`; a resource without it fails with
 *   `missing-sample-data`.
 * - `immediate-error`: deliver the returned error as-is, without the error map.
 * - `immediate-override`: decode the returned bytes as if a transport had sent them.
 */
export type StubBehavior<E> =
  | { type: 'immediate' }
  | { type: 'immediate-error'; error: (resource: AnyResource) => E }
  | { type: 'immediate-override'; data: (resource: AnyResource) => Uint8Array };

/** Handle returned by callback-style calls. */
export interface CancelableOperation {
  /**
   * Aborts the pending request and suppresses the callback.
   * Idempotent, and a no-op once the callback has run.
   */
  cancel(): void;
}

/** Logger accepted by the client; `console` satisfies it. */
export type Logger = Pick<Console, 'debug' | 'warn'>;

/**
 * Final outcome of a call before it is handed to a calling convention.
 */
export type Resolution<E, T> = { ok: true; value: T } | { ok: false; error: E };
