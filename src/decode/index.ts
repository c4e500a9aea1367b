/**
 * Decode entrypoint: parse functions and decoders turning response bytes into typed values.
 * @module
 */
export { JsonDecoder, type JsonDecoderOptions, parseJson, parseNothing, parseText } from './decoders.js';
export type { Decoder, ParseFunction } from './types.js';
export { validateSync } from './validate.js';
