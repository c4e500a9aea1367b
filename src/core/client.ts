import { AbortError } from '../error/abortError.js';
import { FetchTransport } from '../fetch/transport.js';
import type { Resource } from '../resource/resource.js';
import type { HttpRequest, Transport, TransportResponse } from '../types/request.js';
import { buildRequest } from '../utils/buildRequest.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { normalize, resolveStub, settleResponse } from './pipeline.js';
import type { CancelableOperation, ErrorMap, Logger, Resolution, StubBehavior } from './types.js';

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps<E> {
  /** Prefix every resource path is appended to (e.g. `https://api.example.com/v1`). */
  baseUrl: string;
  /**
   * Default headers merged into every resource; a resource's own value wins on conflict.
   * @default { 'Content-Type': 'application/json' }
   */
  headers?: Record<string, string>;
  /** Converts every failure into the caller's error type, exactly once per failed call. */
  errorMap: ErrorMap<E>;
  /** Request executor. Defaults to a {@link FetchTransport} without timeout. */
  transport?: Transport;
  /** Initial stub behavior; `null` sends real requests. */
  stub?: StubBehavior<E> | null;
  /** Receives debug lines about stubbed and failed calls. Silent by default. */
  logger?: Logger;
}

/** Runtime configuration accepted by {@link RequestClient.config}. */
export interface Config {
  /** Replaces the default header map as a whole. */
  headers?: Record<string, string>;
}

/** Options for awaited and streamed calls. */
export interface CallOptions {
  /** Aborts the in-flight request; the call then fails with a `transport` error. */
  signal?: AbortSignal;
}

/** Callback receiving the outcome of {@link RequestClient.load} as an error-first tuple. */
export type Completion<E, T> = (result: SafeWrap<E, T>) => void;

/** Operation returned for stubbed calls, which complete before `load` returns. */
export const noopOperation: CancelableOperation = Object.freeze({ cancel: () => undefined });

const silentLogger: Logger = { debug: () => undefined, warn: () => undefined };

/** A call after reading the client configuration: either already resolved by a stub, or ready to send. */
type Prepared<E, T> =
  | { type: 'stubbed'; resolution: Resolution<E, T> }
  | { type: 'remote'; resource: Resource<T>; request: HttpRequest };

function toSafeWrap<E, T>(resolution: Resolution<E, T>): SafeWrap<E, T> {
  return resolution.ok ? [null, resolution.value] : [resolution.error, null];
}

/**
 * Typed HTTP client that runs every {@link Resource} through one pipeline:
 * stub check, header merge, request construction, transport, status and body validation,
 * decoding, and error normalization through `errorMap`.
 *
 * The pipeline is exposed three ways, with identical semantics:
 * - {@link RequestClient.load}: callback with a cancelable operation,
 * - {@link RequestClient.request}: a promise of the value,
 * - {@link RequestClient.stream}: a single-value async iterable.
 *
 * Default headers and the stub behavior are read once when a call starts, so changing
 * them never affects calls already in flight.
 *
 * @typeParam E - Error type produced by `errorMap`.
 */
export class RequestClient<E> {
  /** Prefix of every request URL. */
  #baseUrl: string;
  /** Default headers; replaced as a whole, never mutated. */
  #headers: Readonly<Record<string, string>>;
  /** Caller-supplied failure conversion. */
  #errorMap: ErrorMap<E>;
  /** Request executor. */
  #transport: Transport;
  /** Active stub behavior, `null` when calls go to the transport. */
  #stub: StubBehavior<E> | null;
  /** Debug/warn sink. */
  #logger: Logger;

  /**
   * Creates a client bound to a base URL and error map.
   *
   * @param props - Base URL, error map, and optional headers, transport, stub and logger.
   */
  constructor({
    baseUrl,
    headers = { 'Content-Type': 'application/json' },
    errorMap,
    transport = new FetchTransport(),
    stub = null,
    logger = silentLogger,
  }: RequestClientProps<E>) {
    this.#baseUrl = baseUrl;
    this.#headers = Object.freeze({ ...headers });
    this.#errorMap = errorMap;
    this.#transport = transport;
    this.#stub = stub && Object.freeze({ ...stub });
    this.#logger = logger;
  }

  /** Prefix every resource path is appended to. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Current default headers. */
  get headers(): Readonly<Record<string, string>> {
    return this.#headers;
  }

  /** Current stub behavior, `null` when calls reach the transport. */
  get stubBehavior(): StubBehavior<E> | null {
    return this.#stub;
  }

  /**
   * Updates runtime configuration. Calls already started keep the headers they began with.
   */
  config({ headers }: Config) {
    if (headers) {
      this.#headers = Object.freeze({ ...headers });
    }
  }

  /**
   * Replaces the active stub behavior; `null` turns stubbing off.
   * Calls already started keep the behavior they began with.
   */
  stub(behavior: StubBehavior<E> | null) {
    this.#stub = behavior && Object.freeze({ ...behavior });
  }

  /**
   * Starts a call and reports its outcome to `completion` as `[error, value]`.
   *
   * - `completion` runs exactly once, unless the operation is canceled first.
   * - Stubbed calls complete before `load` returns, and return {@link noopOperation}.
   *
   * @throws {ConstructURLError} When base URL and path do not form a valid URL.
   * @returns An operation whose `cancel` aborts the request and suppresses `completion`.
   */
  load<T>(resource: Resource<T>, completion: Completion<E, T>): CancelableOperation {
    const prepared = this.#prepare(resource);
    if (prepared.type === 'stubbed') {
      completion(toSafeWrap(prepared.resolution));
      return noopOperation;
    }

    const controller = new AbortController();
    let settled = false;

    void this.#perform(prepared.resource, prepared.request, controller.signal)
      .then((resolution) => {
        if (settled) {
          this.#logger.warn(`dropped outcome of canceled ${prepared.request.method} ${prepared.request.url}`);
          return;
        }

        settled = true;
        completion(toSafeWrap(resolution));
      })
      .catch((error: unknown) => {
        // errorMap or completion threw
        this.#logger.warn(`error delivering outcome of ${prepared.request.method} ${prepared.request.url}`, error);
        queueMicrotask(() => {
          throw error;
        });
      });

    return {
      cancel: () => {
        if (settled) {
          return;
        }

        settled = true;
        controller.abort(new AbortError(`error ${prepared.request.method} ${prepared.request.url} canceled`));
      },
    };
  }

  /**
   * Performs a call and resolves with the decoded value.
   *
   * @throws {ConstructURLError} Synchronously, when base URL and path do not form a valid URL.
   * @returns A promise resolving to the value, or rejecting with the mapped error `E`.
   */
  request<T>(resource: Resource<T>, { signal }: CallOptions = {}): Promise<T> {
    const prepared = this.#prepare(resource);
    const pending =
      prepared.type === 'stubbed'
        ? Promise.resolve(prepared.resolution)
        : this.#perform(prepared.resource, prepared.request, signal);

    return pending.then((resolution) => {
      if (resolution.ok) {
        return resolution.value;
      }

      throw resolution.error;
    });
  }

  /**
   * Exposes a call as an async iterable that yields one value and completes, or throws `E`.
   * Every iteration runs its own call, reading the configuration when it starts.
   *
   * @throws {ConstructURLError} Synchronously, when no stub is active and base URL and path
   * do not form a valid URL.
   */
  stream<T>(resource: Resource<T>, opts: CallOptions = {}): AsyncIterable<T> {
    if (!this.#stub) {
      buildRequest(this.#baseUrl, resource.append(this.#headers));
    }

    return {
      [Symbol.asyncIterator]: () => this.#iterate(resource, opts),
    };
  }

  async *#iterate<T>(resource: Resource<T>, opts: CallOptions): AsyncGenerator<T, void, undefined> {
    yield await this.request(resource, opts);
  }

  /**
   * Reads headers and stub behavior once, then either resolves the call from the stub
   * or merges headers and builds the request.
   */
  #prepare<T>(resource: Resource<T>): Prepared<E, T> {
    const headers = this.#headers;
    const stub = this.#stub;

    if (stub) {
      this.#logger.debug(`stubbed ${resource.method.name} ${resource.pathString} with ${stub.type}`);
      return { type: 'stubbed', resolution: resolveStub(resource, stub, this.#errorMap) };
    }

    const merged = resource.append(headers);
    return { type: 'remote', resource: merged, request: buildRequest(this.#baseUrl, merged) };
  }

  /**
   * Sends a prepared request and runs the response through validation, decoding and the error map.
   * Never rejects on transport failures, including a transport that throws.
   */
  async #perform<T>(resource: Resource<T>, request: HttpRequest, signal?: AbortSignal): Promise<Resolution<E, T>> {
    const settled = settleResponse(resource, await this.#send(request, signal));
    const [failure] = settled;
    if (failure) {
      this.#logger.debug(
        `${request.method} ${request.url} failed with ${failure.error.type}: ${failure.error.error.message}`,
      );
    }

    return normalize(settled, this.#errorMap);
  }

  /**
   * Calls the transport, folding a rejected promise into the error slot.
   * A rejection reason that is not an `Error` becomes the cause of one.
   */
  async #send(request: HttpRequest, signal?: AbortSignal): SafeWrapAsync<Error, TransportResponse> {
    const [errSend, outcome] = await safeWrapAsync<unknown, SafeWrap<Error, TransportResponse>>(() =>
      this.#transport.send(request, signal ? { signal } : {}),
    );
    if (outcome === null) {
      return [
        errSend instanceof Error ? errSend : new Error(`error ${request.method} rejected by transport`, { cause: errSend }),
        null,
      ];
    }

    return outcome;
  }
}
