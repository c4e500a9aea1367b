/**
 * Resource entrypoint: typed endpoint descriptors and their type-erased projection.
 * @module
 */
export {
  type BodylessMethodName,
  type BodyMethodName,
  type HttpMethod,
  type HttpMethodName,
  methodBody,
  type RequestBody,
  toHttpMethod,
} from './method.js';
export { type PathConvertible, type PathLike, toPathString } from './path.js';
export {
  type AnyResource,
  type DecodedValue,
  type HeaderCombine,
  type HeaderMap,
  isSuccessStatus,
  Resource,
  type ResourceProps,
  type StatusPredicate,
} from './resource.js';
