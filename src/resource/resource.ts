import type { Decoder, ParseFunction } from '../decode/types.js';
import { DecodeError } from '../error/decodeError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { safeWrap } from '../utils/wrap.js';
import { type HttpMethod, type HttpMethodName, toHttpMethod } from './method.js';
import { type PathLike, toPathString } from './path.js';

/** Predicate deciding whether a response status is accepted. */
export type StatusPredicate = (status: number) => boolean;

/** Header map of a resource; keys are unique. */
export type HeaderMap = Readonly<Record<string, string>>;

/** Resolves a header present on both sides of a merge, `(existing, incoming) => value`. */
export type HeaderCombine = (existing: string, incoming: string) => string;

/** Default status acceptance: `200 <= status < 300`. */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Fields shared by every resource regardless of how it decodes. */
interface ResourceFields {
  /** Path appended to the client's base URL. */
  path: PathLike;
  /**
   * HTTP method, as a name or with a body for POST/PUT/PATCH.
   * @default 'GET'
   */
  method?: HttpMethod | HttpMethodName;
  /** Headers sent with the resource; they win over client defaults. */
  headers?: Record<string, string>;
  /** Query parameters rendered into the URL. */
  parameters?: Record<string, string> | null;
  /**
   * Status acceptance predicate.
   * @default isSuccessStatus
   */
  acceptableStatusCode?: StatusPredicate;
  /** Canned body served by the `immediate` stub. */
  sampleData?: Uint8Array | null;
}

/**
 * Constructor options for {@link Resource}. Either `parse` or `decoder` is required;
 * when both are given the decoder takes precedence during calls.
 */
export type ResourceProps<T> = ResourceFields &
  ({ parse: ParseFunction<T>; decoder?: Decoder<T> | null } | { parse?: undefined; decoder: Decoder<T> });

/**
 * Result of an erased parse: the success value is opaque and must not be downcast.
 */
export type DecodedValue = { type: 'success'; value: unknown } | { type: 'failure'; error: DecodeError };

/**
 * Type-erased projection of a {@link Resource}, produced by {@link Resource.erase}.
 * Lets stub closures be declared once per client rather than once per value type.
 */
export interface AnyResource {
  readonly path: PathLike;
  /** Rendered {@link AnyResource.path} */
  readonly pathString: string;
  readonly method: HttpMethod;
  readonly headers: HeaderMap;
  readonly parameters: HeaderMap | null;
  readonly acceptableStatusCode: StatusPredicate;
  readonly sampleData: Uint8Array | null;
  readonly decoder: Decoder<unknown> | null;
  /** The resource's parse function, with the success value erased */
  parse(data: Uint8Array): DecodedValue;
}

/**
 * Immutable description of one typed remote endpoint.
 *
 * `append` and `map` derive new resources and never touch the original.
 *
 * @typeParam T - Value the resource decodes to.
 * @example
 * const user = new Resource({
 *   path: '/users/42',
 *   parse: parseJson(z.object({ id: z.number(), name: z.string() })),
 * });
 */
export class Resource<T> {
  readonly path: PathLike;
  readonly method: HttpMethod;
  readonly headers: HeaderMap;
  readonly parameters: HeaderMap | null;
  readonly acceptableStatusCode: StatusPredicate;
  readonly sampleData: Uint8Array | null;
  /** Decoder override, used instead of `parse` during calls when set. */
  readonly decoder: Decoder<T> | null;
  readonly parse: ParseFunction<T>;

  constructor(props: ResourceProps<T>) {
    this.path = props.path;
    this.method = toHttpMethod(props.method ?? 'GET');
    this.headers = Object.freeze({ ...props.headers });
    this.parameters = props.parameters ? Object.freeze({ ...props.parameters }) : null;
    this.acceptableStatusCode = props.acceptableStatusCode ?? isSuccessStatus;
    this.sampleData = props.sampleData ?? null;

    if (props.parse === undefined) {
      const decoder = props.decoder;
      this.decoder = decoder;
      this.parse = (data) => decoder.decode(data);
    } else {
      this.decoder = props.decoder ?? null;
      this.parse = props.parse;
    }
  }

  /** Rendered {@link Resource.path}. */
  get pathString(): string {
    return toPathString(this.path);
  }

  /**
   * Decodes bytes the way a call does: the decoder override wins, otherwise `parse` runs.
   */
  decode(data: Uint8Array): SafeWrap<DecodeError, T> {
    if (this.decoder) {
      return this.decoder.decode(data);
    }

    return this.parse(data);
  }

  /**
   * Returns a copy with `headers` merged in. On conflicting names (compared case-insensitively)
   * the existing value is kept, unless `combine` is given, in which case its result is used.
   */
  append(headers: Record<string, string>, combine?: HeaderCombine): Resource<T> {
    const merged: Record<string, string> = { ...this.headers };
    // Header names compare case-insensitively; the existing spelling is kept.
    const names = new Map(Object.keys(merged).map((key) => [key.toLowerCase(), key]));
    for (const [key, incoming] of Object.entries(headers)) {
      const existingKey = names.get(key.toLowerCase());
      if (existingKey === undefined) {
        merged[key] = incoming;
        names.set(key.toLowerCase(), key);
        continue;
      }

      if (combine) {
        merged[existingKey] = combine(merged[existingKey], incoming);
      }
    }

    return new Resource<T>({ ...this.#fields(), headers: merged, parse: this.parse, decoder: this.decoder });
  }

  /**
   * Returns a resource decoding to `transform(value)`. Every other field is carried over,
   * including sample data and a decoder override (composed with `transform` as well).
   * A throwing `transform` surfaces as a `thrown` {@link DecodeError}.
   */
  map<U>(transform: (value: T) => U): Resource<U> {
    const parse = this.parse;
    const decoder = this.decoder;

    return new Resource<U>({
      ...this.#fields(),
      parse: (data) => mapDecoded(parse(data), transform),
      decoder: decoder && { decode: (data) => mapDecoded(decoder.decode(data), transform) },
    });
  }

  /** Projects the resource into an {@link AnyResource}, hiding `T`. */
  erase(): AnyResource {
    const parse = this.parse;

    return {
      path: this.path,
      pathString: this.pathString,
      method: this.method,
      headers: this.headers,
      parameters: this.parameters,
      acceptableStatusCode: this.acceptableStatusCode,
      sampleData: this.sampleData,
      decoder: this.decoder,
      parse: (data) => {
        const [error, value] = parse(data);
        if (error) {
          return { type: 'failure', error };
        }

        return { type: 'success', value };
      },
    };
  }

  #fields(): ResourceFields {
    return {
      path: this.path,
      method: this.method,
      headers: { ...this.headers },
      parameters: this.parameters && { ...this.parameters },
      acceptableStatusCode: this.acceptableStatusCode,
      sampleData: this.sampleData,
    };
  }
}

function mapDecoded<T, U>(result: SafeWrap<DecodeError, T>, transform: (value: T) => U): SafeWrap<DecodeError, U> {
  const [error, value] = result;
  if (error) {
    return [error, null];
  }

  const [errTransform, mapped] = safeWrap<Error, U>(() => transform(value));
  if (errTransform) {
    return [new DecodeError('error transforming decoded value', 'thrown', [], { cause: errTransform }), null];
  }

  return [null, mapped];
}
