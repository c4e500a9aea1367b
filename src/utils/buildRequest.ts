import { ConstructURLError } from '../error/constructUrlError.js';
import { methodBody } from '../resource/method.js';
import type { HeaderMap, Resource } from '../resource/resource.js';
import type { HttpRequest } from '../types/request.js';
import { safeWrap } from './wrap.js';

/**
 * Renders query parameters as `key=value` pairs joined by `&`.
 * Keys are sorted, so equal maps always render the same string; keys and values are percent-encoded.
 */
export function renderQuery(parameters: HeaderMap | null): string {
  if (!parameters) {
    return '';
  }

  return Object.keys(parameters)
    .sort()
    .map((key) => `${encodeURIComponent(key)}=${encodeURIComponent(parameters[key])}`)
    .join('&');
}

/**
 * Builds the concrete request for a resource whose headers are already merged with client defaults.
 *
 * - Concatenates `baseUrl` and the resource path, then appends rendered `parameters`
 *   after any query the path already carries.
 * - Attaches the method body for POST/PUT/PATCH.
 * - Sets every resource header once.
 *
 * @throws {ConstructURLError} When base URL and path do not form a valid URL, a parameter
 * cannot be percent-encoded, or a header name or value is invalid. These are programming
 * errors, so they are thrown rather than returned.
 */
export function buildRequest<T>(baseUrl: string, resource: Resource<T>): HttpRequest {
  const raw = `${baseUrl}${resource.pathString}`;
  const [errUrl, url] = safeWrap(() => new URL(raw));
  if (errUrl) {
    throw new ConstructURLError(`error constructing URL from ${raw}`, raw, { cause: errUrl });
  }

  const [errQuery, query] = safeWrap(() => renderQuery(resource.parameters));
  if (errQuery) {
    throw new ConstructURLError(`error rendering query parameters for ${raw}`, raw, { cause: errQuery });
  }

  if (query) {
    url.search = url.search ? `${url.search.slice(1)}&${query}` : query;
  }

  const headers = new Headers();
  for (const [key, value] of Object.entries(resource.headers)) {
    const [errHeader] = safeWrap(() => headers.set(key, value));
    if (errHeader) {
      throw new ConstructURLError(`error setting header ${key} for ${raw}`, raw, { cause: errHeader });
    }
  }

  return {
    method: resource.method.name,
    url: url.href,
    headers,
    body: methodBody(resource.method),
  };
}
