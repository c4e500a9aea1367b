/** Constructor shape accepted by the error helpers. */
// biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any constructor signature
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Walks an error and its `cause` chain, returning the first link matching `errorClass`.
 *
 * A link matches when it is an instance of the class, carries the class name as its `name`,
 * or has a message prefixed with the class name (errors re-thrown by message only).
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    if (current.name === errorClass.name || current.message.startsWith(errorClass.name)) {
      return current as T;
    }

    current = current.cause;
  }

  return null;
}
