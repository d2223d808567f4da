export type AccessTarget = 'file' | 'directory';

/**
 * A document or directory that could not be read. `code` is the system error code
 * (ENOENT, EACCES, ...) when there is one.
 */
export class DocumentAccessError extends Error {
  readonly path: string;
  readonly code: string | undefined;

  constructor(message: string, path: string, code: string | undefined, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocumentAccessError';
    this.path = path;
    this.code = code;
  }

  static from(error: unknown, path: string, target: AccessTarget): DocumentAccessError {
    if (error instanceof DocumentAccessError) return error;

    const code = errorCode(error);
    const noun = target === 'directory' ? 'Directory' : 'File';

    let message: string;
    switch (code) {
      case 'ENOENT':
        message = `${noun} does not exist: ${path}`;
        break;
      case 'EACCES':
      case 'EPERM':
        message = `Permission denied: ${path}`;
        break;
      case 'ENOTDIR':
        message = `Path is not a directory: ${path}`;
        break;
      case 'EISDIR':
        message = `Path is a directory: ${path}`;
        break;
      default:
        message = `Cannot read ${target} ${path}: ${error instanceof Error ? error.message : String(error)}`;
    }

    return new DocumentAccessError(message, path, code, { cause: error });
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}
