/**
 * The part of a writable stream that commands and reporters write to
 *
 * `process.stdout` and `process.stderr` satisfy it; tests pass a string buffer.
 */
export interface OutputStream {
  write(chunk: string): unknown;
}
