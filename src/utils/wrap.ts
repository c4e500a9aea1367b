/**
 * Error-first tuple used across the pipeline, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/** Error slot value for a rejection or throw without a reason, so `if (err)` checks always see it. */
function toReason(error: unknown): unknown {
  return error || new Error('error thrown without a reason', { cause: error });
}

/**
 * Runs a promise factory and captures a rejection in the error slot.
 * @example
 * const [error, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toReason(error) as ErrorType, null];
  }
}

/**
 * Synchronous variant of {@link safeWrapAsync}.
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toReason(error) as ErrorType, null];
  }
}

