/** Methods that never carry a request body. */
export type BodylessMethodName = 'OPTIONS' | 'GET' | 'HEAD' | 'DELETE' | 'TRACE' | 'CONNECT';

/** Methods that may carry a request body. */
export type BodyMethodName = 'POST' | 'PUT' | 'PATCH';

/** Every method a resource can use. */
export type HttpMethodName = BodylessMethodName | BodyMethodName;

/** Raw request payload attached to POST, PUT and PATCH. */
export type RequestBody = Uint8Array | string;

/**
 * HTTP method of a resource. Only POST, PUT and PATCH carry a body.
 * @example
 * const create: HttpMethod = { name: 'POST', body: JSON.stringify({ name: 'a' }) };
 */
export type HttpMethod = { name: BodylessMethodName } | { name: BodyMethodName; body?: RequestBody };

/** Normalizes a bare method name into an {@link HttpMethod}. */
export function toHttpMethod(method: HttpMethod | HttpMethodName): HttpMethod {
  if (typeof method === 'string') {
    return { name: method };
  }

  return method;
}

/** Body carried by the method, or `null` for bodyless methods and empty payloads. */
export function methodBody(method: HttpMethod): RequestBody | null {
  switch (method.name) {
    case 'POST':
    case 'PUT':
    case 'PATCH':
      return method.body ?? null;
    default:
      return null;
  }
}
