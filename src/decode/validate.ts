import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema, synchronously.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)`; a throw becomes a `schema` {@link DecodeError}.
 * - A Promise result is rejected with an `async` {@link DecodeError}, since decoding never suspends.
 * - A result with `issues` becomes a `schema` {@link DecodeError} carrying the issues.
 * - Otherwise returns `[null, result.value]`.
 */
export function validateSync<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrap<DecodeError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, result] = safeWrap<Error, ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new DecodeError('error validating on validation start', 'schema', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new DecodeError(`error schema from ${schema['~standard'].vendor} validates asynchronously`, 'async'), null];
  }

  if (result.issues) {
    return [new DecodeError('error validating data', 'schema', [...result.issues]), null];
  }

  return [null, result.value];
}
