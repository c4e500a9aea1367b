import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Stage of decoding that failed.
 * - `syntax`: the bytes are not well-formed for the format (e.g. invalid JSON).
 * - `schema`: the payload parsed, but did not match the expected shape.
 * - `async`: the schema tried to validate asynchronously, which decoding does not allow.
 * - `thrown`: a parse function, or a mapping applied after it, threw.
 */
export type DecodeErrorKind = 'syntax' | 'schema' | 'async' | 'thrown';

/**
 * Error representing bytes that could not be decoded into the resource's value type.
 * Schema mismatches keep the Standard Schema issues, so callers can point at the offending field.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static name = 'DecodeError';
  /** Stage of decoding that failed */
  kind: DecodeErrorKind;
  /** Schema issues, empty unless `kind` is `schema` */
  issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new DecodeError, appending issues to the message when present */
  constructor(
    message: string,
    kind: DecodeErrorKind,
    issues: readonly StandardSchemaV1.Issue[] = [],
    opts?: ErrorOptions,
  ) {
    super(issues.length > 0 ? `${message}; issues: ${JSON.stringify(issues)}` : message, opts);

    this.kind = kind;
    this.issues = issues;
  }

  /**
   * Dotted paths of every issue, e.g. `user.tags.0`. Issues at the root render as an empty string.
   */
  issuePaths(): string[] {
    return this.issues.map((issue) =>
      (issue.path ?? []).map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.'),
    );
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
