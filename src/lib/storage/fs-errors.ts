/**
 * Node file-system error narrowing
 */

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isFileNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}
