import type { HeaderOptions, HttpRequest, Transport, TransportOptions, TransportResponse } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** Headers sent with every request; request headers win on conflict. */
  headers?: HeaderOptions;
  /** Fetch credentials mode. */
  credentials?: RequestInit['credentials'];
  /** Fetch mode. */
  mode?: RequestInit['mode'];
  /**
   * Request timeout in milliseconds, `false` to disable.
   * A timed out request fails with a {@link TimeoutError} cause.
   * @default false
   */
  timeout?: number | false;
}

/**
 * {@link Transport} on top of the global `fetch`:
 * - reads every response body fully into bytes, whatever the status,
 * - merges its default headers under the request's,
 * - combines the caller's abort signal with its own timeout.
 */
export class FetchTransport implements Transport {
  /** Default fetch options (headers, credentials, mode, timeout). */
  #opts: FetchTransportOptions;

  /** Creates a new fetch transport with optional defaults */
  constructor(opts: FetchTransportOptions = {}) {
    this.#opts = opts;
  }

  /**
   * Performs the request, clearing the timeout once an outcome is known.
   *
   * Errors:
   * - A rejected `fetch` (network failure, abort, timeout) is wrapped in `Error`, keeping the
   *   abort reason as cause when the signal fired.
   * - A failure while reading the body is wrapped the same way.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: HttpRequest, { signal }: TransportOptions = {}): SafeWrapAsync<Error, TransportResponse> {
    const timeoutSignal = createTimeoutSignal(this.#opts.timeout);
    const mergedSignal = mergeSignals([signal, timeoutSignal?.signal]);

    const result = await this.#request(request, mergedSignal);
    timeoutSignal?.clear();

    return result;
  }

  /**
   * Runs `fetch` and reads the body as bytes, keeping the abort reason as cause once the signal fired.
   */
  async #request(request: HttpRequest, signal: AbortSignal | null): SafeWrapAsync<Error, TransportResponse> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(request.url, {
        method: request.method,
        headers: mergeHeaderOptions(this.#opts.headers, request.headers),
        body: request.body ?? undefined,
        credentials: this.#opts.credentials,
        mode: this.#opts.mode,
        ...(signal && { signal }),
      }),
    );

    if (err) {
      return [
        new Error(`error ${request.method} request in fetchTransport`, { cause: signal?.aborted ? signal.reason : err }),
        null,
      ];
    }

    const [errBody, body] = await safeWrapAsync(() => res.arrayBuffer());
    if (errBody) {
      return [
        new Error(`error reading ${request.method} response body in fetchTransport`, {
          cause: signal?.aborted ? signal.reason : errBody,
        }),
        null,
      ];
    }

    return [null, { status: res.status, headers: res.headers, body: new Uint8Array(body) }];
  }
}
