import type { ClientError, ErrorMap } from './types.js';

/**
 * Error map that keeps the {@link ClientError} as the caller's error type,
 * for clients that want the library's own failure classification.
 * @example
 * const client = new RequestClient({ baseUrl: 'https://api.example.com', errorMap: identityErrorMap });
 */
export const identityErrorMap: ErrorMap<ClientError> = (error) => error;
