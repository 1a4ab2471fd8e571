/**
 * An error that is reported to the user by its message alone, without a stack trace
 */
export class SimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Errors from `fs` and `child_process` may come from another realm, so check the shape
 */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return typeof e === 'object' && e !== null && 'code' in e && 'message' in e;
}

/**
 * Compare strings by code point
 */
export function compareStrings(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? `${e.name}: ${e.message}` : `${e}`;
}
