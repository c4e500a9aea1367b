import type { DecodeError } from '../error/decodeError.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Pure function turning response bytes into a typed value or a {@link DecodeError}.
 * Must return equal results for identical bytes, so stubs can replay it safely.
 */
export type ParseFunction<T> = (data: Uint8Array) => SafeWrap<DecodeError, T>;

/** Decoder instance that can override a resource's parse function. Decoding is synchronous. */
export interface Decoder<T> {
  /** Decodes the bytes into `T` */
  decode(data: Uint8Array): SafeWrap<DecodeError, T>;
}
