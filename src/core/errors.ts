/**
 * Errors raised by the walker. Traversal errors and errors thrown by a
 * FoundFileFn are not wrapped; they reach the caller as they were thrown.
 */

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The walk configuration is unusable
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The search directory could not be turned into an absolute path
 */
export class PathResolutionError extends Error {
  readonly targetDirPath: string;

  constructor(targetDirPath: string, cause: unknown) {
    super(
      `Failed to resolve search directory '${targetDirPath}' - ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'PathResolutionError';
    this.targetDirPath = targetDirPath;
  }
}

/**
 * Opening or reading a file for hashing failed
 */
export class FileHashError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to hash file '${filePath}' - ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'FileHashError';
    this.filePath = filePath;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
