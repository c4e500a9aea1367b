import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { parseJson } from '../decode/decoders.js';
import { AbortError } from '../error/abortError.js';
import { ConstructURLError } from '../error/constructUrlError.js';
import { HTTPError } from '../error/httpError.js';
import { Resource } from '../resource/resource.js';
import type { Transport, TransportResponse } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { noopOperation, RequestClient } from './client.js';
import { identityErrorMap } from './errorMap.js';
import type { ClientError, ClientErrorType, ErrorMap } from './types.js';

const BASE_URL = 'https://api.example.com/v1';
const ITEM_URL = `${BASE_URL}/items/1`;

const encode = (text: string) => new TextEncoder().encode(text);

const respond = (status: number, body = ''): SafeWrap<Error, TransportResponse> => [
  null,
  { status, headers: new Headers(), body: encode(body) },
];

const item = new Resource({
  path: '/items/1',
  parse: parseJson(z.object({ id: z.number() })),
  sampleData: encode('{"id":1}'),
});

/** Transport whose requests only settle when their signal aborts. */
const hangingSend: Transport['send'] = (_request, { signal } = {}) =>
  new Promise<SafeWrap<Error, TransportResponse>>((resolve) => {
    signal?.addEventListener('abort', () => {
      resolve([new Error('error request aborted', { cause: signal.reason }), null]);
    });
  });

function setup<E = ClientError>(errorMap?: ErrorMap<E>) {
  const send = vi.fn<Transport['send']>();
  const logger = { debug: vi.fn(), warn: vi.fn() };
  const client = new RequestClient<E | ClientError>({
    baseUrl: BASE_URL,
    errorMap: errorMap ?? identityErrorMap,
    transport: { send },
    logger,
  });

  return { client, send, logger };
}

const rejection = <E>(promise: Promise<unknown>): Promise<E> =>
  promise.then(
    () => {
      throw new Error('expected the call to reject');
    },
    (error: E) => error,
  );

function loadResult<T>(client: RequestClient<ClientError>, resource: Resource<T>) {
  return new Promise<SafeWrap<ClientError, T>>((resolve) => {
    client.load(resource, resolve);
  });
}

class ApiError extends Error {
  constructor(
    readonly type: ClientErrorType,
    readonly payload: string | null,
    opts?: ErrorOptions,
  ) {
    super(`api error ${type}`, opts);
  }
}

afterEach(() => {
  vi.clearAllMocks();
});

describe('RequestClient', () => {
  describe('create', () => {
    it('exposes its configuration', () => {
      const client = new RequestClient({ baseUrl: BASE_URL, errorMap: identityErrorMap });

      expect(client.baseUrl).toBe(BASE_URL);
      expect(client.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(client.stubBehavior).toBeNull();
    });

    it('replaces default headers as a whole through config', () => {
      const client = new RequestClient({ baseUrl: BASE_URL, errorMap: identityErrorMap });

      client.config({ headers: { Accept: 'text/plain' } });

      expect(client.headers).toEqual({ Accept: 'text/plain' });
    });

    it('keeps headers when config omits them', () => {
      const client = new RequestClient({ baseUrl: BASE_URL, headers: { A: '1' }, errorMap: identityErrorMap });

      client.config({});

      expect(client.headers).toEqual({ A: '1' });
    });
  });

  describe('request', () => {
    it('resolves the decoded value', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));

      await expect(client.request(item)).resolves.toEqual({ id: 1 });

      expect(send).toHaveBeenCalledTimes(1);
      const [request, opts] = send.mock.calls[0];
      expect(request.method).toBe('GET');
      expect(request.url).toBe(ITEM_URL);
      expect(request.headers.get('content-type')).toBe('application/json');
      expect(request.body).toBeNull();
      expect(opts).toEqual({});
    });

    it('lets resource headers win over client defaults', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));

      await client.request(item.append({ 'content-type': 'text/plain', 'X-Extra': 'yes' }));

      const [request] = send.mock.calls[0];
      expect(request.headers.get('content-type')).toBe('text/plain');
      expect(request.headers.get('x-extra')).toBe('yes');
    });

    it('sends the method body', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(201, '{"id":2}'));
      const create = new Resource({
        path: '/items',
        method: { name: 'POST', body: '{"name":"two"}' },
        parse: parseJson(z.object({ id: z.number() })),
      });

      await expect(client.request(create)).resolves.toEqual({ id: 2 });

      const [request] = send.mock.calls[0];
      expect(request.method).toBe('POST');
      expect(request.body).toBe('{"name":"two"}');
    });

    it('rejects with a status error', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(404, '{"message":"missing"}'));

      const error = await rejection<ClientError>(client.request(item));

      expect(error).toMatchObject({ type: 'status', status: 404 });
      expect(error.error).toBeInstanceOf(HTTPError);
    });

    it('rejects with an empty-body error', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200));

      await expect(client.request(item)).rejects.toMatchObject({ type: 'empty-body', status: 200 });
    });

    it('rejects with a decode error', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":"one"}'));

      await expect(client.request(item)).rejects.toMatchObject({ type: 'decode' });
    });

    it('rejects with a transport error when the transport fails', async () => {
      const { client, send } = setup();
      const offline = new Error('offline');
      send.mockResolvedValue([offline, null]);

      await expect(client.request(item)).rejects.toEqual({ type: 'transport', error: offline });
    });

    it('rejects with a transport error when the transport throws', async () => {
      const { client, send } = setup();
      const broken = new Error('broken transport');
      send.mockRejectedValue(broken);

      await expect(client.request(item)).rejects.toEqual({ type: 'transport', error: broken });
    });

    it('rejects with a transport error when the transport rejects without a reason', async () => {
      const { client, send } = setup();
      send.mockImplementation(() => Promise.reject());

      const error = await rejection<ClientError>(client.request(item));

      expect(error.type).toBe('transport');
      expect(error.error).toBeInstanceOf(Error);
      expect(error.error.message).toBe('error thrown without a reason');
    });

    it('wraps a non-error rejection reason from the transport', async () => {
      const { client, send } = setup();
      send.mockRejectedValue('socket closed');

      const error = await rejection<ClientError>(client.request(item));

      expect(error.type).toBe('transport');
      expect(error.error.message).toBe('error GET rejected by transport');
      expect(error.error.cause).toBe('socket closed');
    });

    it('applies the error map exactly once with the response body', async () => {
      const errorMap = vi.fn<ErrorMap<ApiError>>(
        (error, data) => new ApiError(error.type, data && new TextDecoder().decode(data), { cause: error.error }),
      );
      const { client, send } = setup(errorMap);
      send.mockResolvedValue(respond(500, 'upstream down'));

      const error = await rejection<ApiError>(client.request(item));

      expect(error).toBeInstanceOf(ApiError);
      expect(error.type).toBe('status');
      expect(error.payload).toBe('upstream down');
      expect(errorMap).toHaveBeenCalledTimes(1);
    });

    it('aborts through the caller signal', async () => {
      const { client, send } = setup();
      send.mockImplementation(hangingSend);
      const controller = new AbortController();
      const reason = new AbortError('stop');

      const pending = client.request(item, { signal: controller.signal });
      controller.abort(reason);

      const error = await rejection<ClientError>(pending);
      expect(error.type).toBe('transport');
      expect(error.error.cause).toBe(reason);
      expect(send.mock.calls[0][1]?.signal).toBe(controller.signal);
    });

    it('throws ConstructURLError synchronously', () => {
      const client = new RequestClient({ baseUrl: 'not a url', errorMap: identityErrorMap });

      expect(() => client.request(item)).toThrow(ConstructURLError);
    });

    it('keeps concurrent calls independent', async () => {
      const { client, send } = setup();
      send.mockImplementation(async (request) =>
        request.url.endsWith('/items/1') ? respond(200, '{"id":1}') : respond(503, 'busy'),
      );
      const other = new Resource({ path: '/items/2', parse: parseJson(z.object({ id: z.number() })) });

      const [first, second] = await Promise.allSettled([client.request(item), client.request(other)]);

      expect(first).toEqual({ status: 'fulfilled', value: { id: 1 } });
      expect(second).toMatchObject({ status: 'rejected', reason: { type: 'status', status: 503 } });
    });
  });

  describe('load', () => {
    it('delivers the value as an error-first tuple', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));

      await expect(loadResult(client, item)).resolves.toEqual([null, { id: 1 }]);
    });

    it('delivers failures as an error-first tuple', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(500, 'down'));

      const [error, value] = await loadResult(client, item);

      expect(value).toBeNull();
      expect(error?.type).toBe('status');
    });

    it('delivers a transport error when the transport rejects without a reason', async () => {
      const { client, send } = setup();
      send.mockImplementation(() => Promise.reject());

      const [error, value] = await loadResult(client, item);

      expect(value).toBeNull();
      expect(error?.type).toBe('transport');
    });

    it('logs and rethrows an error thrown by the completion callback', async () => {
      const { client, send, logger } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));
      const failure = new Error('callback failed');
      const rethrow = vi.fn<(callback: () => void) => void>();
      vi.stubGlobal('queueMicrotask', rethrow);

      try {
        client.load(item, () => {
          throw failure;
        });

        await vi.waitFor(() => {
          expect(rethrow).toHaveBeenCalledTimes(1);
        });
      } finally {
        vi.unstubAllGlobals();
      }

      expect(logger.warn).toHaveBeenCalledWith(`error delivering outcome of GET ${ITEM_URL}`, failure);
      expect(rethrow.mock.calls[0][0]).toThrow(failure);
    });

    it('aborts the request and suppresses the callback on cancel', async () => {
      const { client, send, logger } = setup();
      send.mockImplementation(hangingSend);
      const callback = vi.fn();

      const operation = client.load(item, callback);
      operation.cancel();
      operation.cancel();

      await vi.waitFor(() => {
        expect(logger.warn).toHaveBeenCalledWith(`dropped outcome of canceled GET ${ITEM_URL}`);
      });

      const signal = send.mock.calls[0][1]?.signal;
      expect(signal?.aborted).toBe(true);
      expect(signal?.reason).toBeInstanceOf(AbortError);
      expect(signal?.reason.message).toBe(`error GET ${ITEM_URL} canceled`);
      expect(callback).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('ignores cancel after completion', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));
      const callback = vi.fn();

      const operation = client.load(item, callback);
      await vi.waitFor(() => {
        expect(callback).toHaveBeenCalledTimes(1);
      });
      operation.cancel();

      expect(send.mock.calls[0][1]?.signal?.aborted).toBe(false);
      expect(callback).toHaveBeenCalledWith([null, { id: 1 }]);
    });

    it('throws ConstructURLError synchronously', () => {
      const client = new RequestClient({ baseUrl: 'not a url', errorMap: identityErrorMap });
      const callback = vi.fn();

      expect(() => client.load(item, callback)).toThrow(ConstructURLError);
      expect(callback).not.toHaveBeenCalled();
    });
  });

  describe('stream', () => {
    it('yields a single value and completes', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));

      const values: { id: number }[] = [];
      for await (const value of client.stream(item)) {
        values.push(value);
      }

      expect(values).toEqual([{ id: 1 }]);
    });

    it('throws the mapped error', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(401, 'denied'));

      const iterator = client.stream(item)[Symbol.asyncIterator]();

      await expect(iterator.next()).rejects.toMatchObject({ type: 'status', status: 401 });
    });

    it('throws ConstructURLError synchronously', () => {
      const client = new RequestClient({ baseUrl: 'not a url', errorMap: identityErrorMap });

      expect(() => client.stream(item)).toThrow(ConstructURLError);
    });

    it('builds nothing up front while a stub is active', async () => {
      const client = new RequestClient({ baseUrl: 'not a url', errorMap: identityErrorMap, stub: { type: 'immediate' } });

      const values: { id: number }[] = [];
      for await (const value of client.stream(item)) {
        values.push(value);
      }

      expect(values).toEqual([{ id: 1 }]);
    });

    it('runs a new call for every iteration, reading configuration when it starts', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));
      const stream = client.stream(item);

      for await (const _ of stream) {
        // drain
      }
      client.config({ headers: { 'X-Version': '2' } });
      for await (const _ of stream) {
        // drain
      }

      expect(send).toHaveBeenCalledTimes(2);
      expect(send.mock.calls[0][0].headers.get('x-version')).toBeNull();
      expect(send.mock.calls[1][0].headers.get('x-version')).toBe('2');
    });
  });

  describe('stubs', () => {
    it('serves sample data synchronously without a transport call', () => {
      const { client, send, logger } = setup();
      client.stub({ type: 'immediate' });
      const callback = vi.fn();

      const operation = client.load(item, callback);

      expect(operation).toBe(noopOperation);
      expect(callback).toHaveBeenCalledWith([null, { id: 1 }]);
      expect(send).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith('stubbed GET /items/1 with immediate');
    });

    it('maps missing sample data through the error map', async () => {
      const errorMap = vi.fn<ErrorMap<ApiError>>((error) => new ApiError(error.type, null));
      const { client } = setup(errorMap);
      client.stub({ type: 'immediate' });
      const bare = new Resource({ path: '/bare', parse: parseJson(z.number()) });

      const error = await rejection<ApiError>(client.request(bare));

      expect(error.type).toBe('missing-sample-data');
      expect(errorMap).toHaveBeenCalledTimes(1);
    });

    it('delivers immediate-error as-is', async () => {
      const errorMap = vi.fn<ErrorMap<ApiError>>((error) => new ApiError(error.type, null));
      const { client, send } = setup(errorMap);
      const stubbed = new ApiError('transport', 'stubbed');
      client.stub({ type: 'immediate-error', error: () => stubbed });

      await expect(client.request(item)).rejects.toBe(stubbed);
      expect(errorMap).not.toHaveBeenCalled();
      expect(send).not.toHaveBeenCalled();
    });

    it('decodes immediate-override data per resource', async () => {
      const { client } = setup();
      client.stub({ type: 'immediate-override', data: (resource) => encode(`{"id":${resource.pathString.length}}`) });

      await expect(client.request(item)).resolves.toEqual({ id: 8 });
    });

    it('goes back to the transport once the stub is cleared', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":5}'));
      client.stub({ type: 'immediate' });
      client.stub(null);

      expect(client.stubBehavior).toBeNull();
      await expect(client.request(item)).resolves.toEqual({ id: 5 });
    });

    it('takes the initial stub from the constructor', async () => {
      const client = new RequestClient({
        baseUrl: BASE_URL,
        errorMap: identityErrorMap,
        stub: { type: 'immediate' },
      });

      expect(client.stubBehavior).toEqual({ type: 'immediate' });
      await expect(client.request(item)).resolves.toEqual({ id: 1 });
    });
  });

  describe('snapshots', () => {
    it('keeps the headers a call started with', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));

      const first = client.request(item);
      client.config({ headers: { 'X-Version': '2' } });
      const second = client.request(item);
      await Promise.all([first, second]);

      expect(send.mock.calls[0][0].headers.get('content-type')).toBe('application/json');
      expect(send.mock.calls[0][0].headers.get('x-version')).toBeNull();
      expect(send.mock.calls[1][0].headers.get('content-type')).toBeNull();
      expect(send.mock.calls[1][0].headers.get('x-version')).toBe('2');
    });

    it('keeps the stub behavior a call started with', async () => {
      const { client, send } = setup();
      send.mockResolvedValue(respond(200, '{"id":9}'));

      client.stub({ type: 'immediate' });
      const stubbed = client.request(item);
      client.stub(null);
      const remote = client.request(item);

      await expect(stubbed).resolves.toEqual({ id: 1 });
      await expect(remote).resolves.toEqual({ id: 9 });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('does not stub calls already sent', async () => {
      const { client, send } = setup();
      send.mockImplementation(hangingSend);
      const controller = new AbortController();

      const pending = client.request(item, { signal: controller.signal });
      client.stub({ type: 'immediate' });
      controller.abort();

      await expect(pending).rejects.toMatchObject({ type: 'transport' });
    });
  });

  describe('logging', () => {
    it('logs failed calls at debug level', async () => {
      const { client, send, logger } = setup();
      send.mockResolvedValue(respond(500, 'down'));

      await client.request(item).catch(() => undefined);

      expect(logger.debug).toHaveBeenCalledWith(`GET ${ITEM_URL} failed with status: error status 500 not accepted`);
    });

    it('stays silent for successful calls', async () => {
      const { client, send, logger } = setup();
      send.mockResolvedValue(respond(200, '{"id":1}'));

      await client.request(item);

      expect(logger.debug).not.toHaveBeenCalled();
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });
});
