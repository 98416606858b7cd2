/**
 * Errno-flavoured error raised by the `node:fs` helpers. Narrowing to this
 * shape lets callers branch on `ENOENT` without pulling the whole `NodeJS`
 * namespace into every module.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Type guard recognising errno-flavoured errors. */
export function isErrnoException(value: unknown): value is ErrnoException {
  return value instanceof Error && "code" in value;
}
