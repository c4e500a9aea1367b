/** Value that can render itself as a request path. */
export interface PathConvertible {
  /** Path appended to the client's base URL, e.g. `/users/42` */
  readonly path: string;
}

/** A plain path string or a {@link PathConvertible}. */
export type PathLike = string | PathConvertible;

/** Renders a {@link PathLike} as a string. */
export function toPathString(path: PathLike): string {
  return typeof path === 'string' ? path : path.path;
}
