/**
 * Fetch entrypoint: the default transport and header helpers.
 * @module
 */
export { FetchTransport, type FetchTransportOptions } from './transport.js';
export { mergeHeaderOptions } from './utils.js';
