import type { ClientError } from '../core/types.js';
import { EmptyBodyError } from '../error/emptyBodyError.js';
import { HTTPError } from '../error/httpError.js';
import type { StatusPredicate } from '../resource/resource.js';
import type { TransportResponse } from '../types/request.js';
import type { SafeWrap } from './wrap.js';

/** 204 No Content is the only status allowed to come back without a body. */
const NO_CONTENT = 204;

/**
 * Checks a response against the resource's status predicate, then that it carries a body.
 *
 * Behavior:
 * - A status rejected by `acceptableStatusCode` returns a `status` error.
 * - Any status other than 204 with an empty body returns an `empty-body` error.
 *   204 is exempt whatever the predicate says.
 * - Otherwise returns `[null, body]`.
 */
export function validateResponse(
  response: TransportResponse,
  acceptableStatusCode: StatusPredicate,
): SafeWrap<ClientError, Uint8Array> {
  const { status, body } = response;

  if (!acceptableStatusCode(status)) {
    return [{ type: 'status', status, error: new HTTPError(status, body, `error status ${status} not accepted`) }, null];
  }

  if (status !== NO_CONTENT && body.byteLength === 0) {
    return [{ type: 'empty-body', status, error: new EmptyBodyError(status) }, null];
  }

  return [null, body];
}
