import { DecodeError } from '../error/decodeError.js';
import { MissingSampleDataError } from '../error/missingSampleDataError.js';
import type { Resource } from '../resource/resource.js';
import type { TransportResponse } from '../types/request.js';
import { validateResponse } from '../utils/validateResponse.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import type { ClientError, ErrorMap, Resolution, StubBehavior } from './types.js';

/** A classified failure waiting for the error map, with the raw body when there was one. */
export interface Failure {
  error: ClientError;
  data: Uint8Array | null;
}

/** Outcome of the pipeline before normalization. */
export type Settled<T> = SafeWrap<Failure, T>;

/**
 * Decodes bytes through the resource (decoder override first, then `parse`).
 * A parse function that throws instead of returning a failure is reported as a `thrown` decode error.
 */
export function decodeBody<T>(resource: Resource<T>, data: Uint8Array): Settled<T> {
  const [errThrown, decoded] = safeWrap(() => resource.decode(data));
  if (errThrown) {
    const error = new DecodeError(`error parse function threw for ${resource.pathString}`, 'thrown', [], {
      cause: errThrown,
    });
    return [{ error: { type: 'decode', error }, data }, null];
  }

  const [errDecode, value] = decoded;
  if (errDecode) {
    return [{ error: { type: 'decode', error: errDecode }, data }, null];
  }

  return [null, value];
}

/**
 * Classifies a transport outcome: transport failure, status/body validation, then decoding.
 * Synchronous once the transport has answered, and shared by every calling convention.
 */
export function settleResponse<T>(resource: Resource<T>, outcome: SafeWrap<Error, TransportResponse>): Settled<T> {
  const [errTransport, response] = outcome;
  if (errTransport) {
    return [{ error: { type: 'transport', error: errTransport }, data: null }, null];
  }

  const [errValidate, body] = validateResponse(response, resource.acceptableStatusCode);
  if (errValidate) {
    return [{ error: errValidate, data: response.body }, null];
  }

  return decodeBody(resource, body);
}

/**
 * Applies the caller's error map to a failure. This is the only place `errorMap` is invoked.
 */
export function normalize<E, T>(settled: Settled<T>, errorMap: ErrorMap<E>): Resolution<E, T> {
  const [failure, value] = settled;
  if (failure) {
    return { ok: false, error: errorMap(failure.error, failure.data) };
  }

  return { ok: true, value };
}

/**
 * Resolves a call from the active stub behavior, without building or sending a request.
 */
export function resolveStub<E, T>(
  resource: Resource<T>,
  behavior: StubBehavior<E>,
  errorMap: ErrorMap<E>,
): Resolution<E, T> {
  switch (behavior.type) {
    case 'immediate-error':
      return { ok: false, error: behavior.error(resource.erase()) };
    case 'immediate-override':
      return normalize(decodeBody(resource, behavior.data(resource.erase())), errorMap);
    case 'immediate': {
      if (!resource.sampleData) {
        const path = resource.pathString;
        const error: ClientError = { type: 'missing-sample-data', path, error: new MissingSampleDataError(path) };
        return normalize<E, T>([{ error, data: null }, null], errorMap);
      }

      return normalize(decodeBody(resource, resource.sampleData), errorMap);
    }
  }
}
