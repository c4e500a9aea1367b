import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import type { Decoder, ParseFunction } from './types.js';
import { validateSync } from './validate.js';

/** Options accepted by {@link JsonDecoder}. */
export interface JsonDecoderOptions {
  /** Reviver handed to `JSON.parse`, e.g. to turn ISO strings into dates before validation. */
  reviver?: (this: unknown, key: string, value: unknown) => unknown;
}

/** Strict UTF-8 decoding, shared by the text based decoders. */
function decodeUtf8(data: Uint8Array): SafeWrap<DecodeError, string> {
  const [err, text] = safeWrap(() => new TextDecoder('utf-8', { fatal: true }).decode(data));
  if (err) {
    return [new DecodeError('error decoding body as utf-8', 'syntax', [], { cause: err }), null];
  }

  return [null, text];
}

/**
 * Decodes JSON bytes and validates them against a Standard Schema (zod, valibot, arktype, ...).
 *
 * @typeParam Schema - Schema describing the decoded value.
 */
export class JsonDecoder<Schema extends StandardSchemaV1> implements Decoder<StandardSchemaV1.InferOutput<Schema>> {
  /** Schema the parsed payload is validated against */
  #schema: Schema;
  /** `JSON.parse` options */
  #opts: JsonDecoderOptions;

  constructor(schema: Schema, opts: JsonDecoderOptions = {}) {
    this.#schema = schema;
    this.#opts = opts;
  }

  decode(data: Uint8Array): SafeWrap<DecodeError, StandardSchemaV1.InferOutput<Schema>> {
    const [errText, text] = decodeUtf8(data);
    if (errText) {
      return [errText, null];
    }

    const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text, this.#opts.reviver));
    if (errJson) {
      return [new DecodeError('error parsing json body', 'syntax', [], { cause: errJson }), null];
    }

    return validateSync(json, this.#schema);
  }
}

/**
 * Parse function for JSON resources, backed by a {@link JsonDecoder}.
 * @example
 * const user = new Resource({ path: '/users/42', parse: parseJson(z.object({ id: z.number() })) });
 */
export function parseJson<Schema extends StandardSchemaV1>(
  schema: Schema,
  opts?: JsonDecoderOptions,
): ParseFunction<StandardSchemaV1.InferOutput<Schema>> {
  const decoder = new JsonDecoder(schema, opts);
  return (data) => decoder.decode(data);
}

/** Parse function returning the body as UTF-8 text. */
export function parseText(): ParseFunction<string> {
  return decodeUtf8;
}

/** Parse function that ignores the body, for endpoints answering 204. */
export function parseNothing(): ParseFunction<undefined> {
  return () => [null, undefined];
}
