/**
 * Error codes for FileLister operations.
 */
export type FileListerErrorCode =
  | 'ROOT_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_ERROR'
  | 'INVALID_PATTERN';

/**
 * Error thrown when a mount root cannot be listed.
 */
export class FileListerError extends Error {
  constructor(
    message: string,
    public readonly code: FileListerErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'FileListerError';
    Object.setPrototypeOf(this, FileListerError.prototype);
  }
}

export function isFileListerError(error: unknown): error is FileListerError {
  return error instanceof FileListerError;
}
