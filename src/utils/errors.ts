/**
 * Error types for cclog.
 *
 * Every error carries a `code` for programmatic handling and an optional
 * `cause`. The CLI prints `message` as a one-line diagnostic; debug logging
 * uses `toDetailedString()` to show the cause chain.
 */

export class CclogError extends Error {
  readonly code: string;

  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }
  }

  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof CclogError) {
        result += ` [${this.cause.code}]`;
      }
    }
    return result;
  }
}

/**
 * Session or project files that cannot be read.
 *
 * Codes: `FILE_NOT_FOUND`, `PERMISSION_DENIED`, `IS_A_DIRECTORY`,
 * `NOT_A_DIRECTORY`, `READ_FAILED`
 */
export class SessionFileError extends CclogError {
  readonly path: string;

  constructor(message: string, code: string, path: string, cause?: unknown) {
    super(message, code, cause);
    this.path = path;
  }
}

/**
 * Markdown export failures.
 *
 * Codes: `OUTPUT_DIR_FAILED`, `WRITE_FAILED`
 */
export class ExportError extends CclogError {}

/**
 * Codes: `INVALID_VALUE`
 */
export class ConfigError extends CclogError {}

const FS_ERROR_CODES: Record<string, { code: string; describe: (path: string) => string }> = {
  ENOENT: { code: 'FILE_NOT_FOUND', describe: p => `No such file or directory: ${p}` },
  EACCES: { code: 'PERMISSION_DENIED', describe: p => `Permission denied: ${p}` },
  EPERM: { code: 'PERMISSION_DENIED', describe: p => `Permission denied: ${p}` },
  EISDIR: { code: 'IS_A_DIRECTORY', describe: p => `Expected a file but found a directory: ${p}` },
  ENOTDIR: { code: 'NOT_A_DIRECTORY', describe: p => `Not a directory: ${p}` },
};

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node filesystem error onto a SessionFileError for `path`.
 */
export function fromFsError(error: unknown, path: string): SessionFileError {
  if (error instanceof SessionFileError) return error;

  const errno = errnoCode(error);
  const known = errno ? FS_ERROR_CODES[errno] : undefined;
  if (known) {
    return new SessionFileError(known.describe(path), known.code, path, error);
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new SessionFileError(`Failed to read ${path}: ${detail}`, 'READ_FAILED', path, error);
}

export function isSessionFileError(error: unknown): error is SessionFileError {
  return error instanceof SessionFileError;
}

export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a CclogError. CclogErrors pass through unchanged.
 */
export function wrapError(error: unknown, message?: string): CclogError {
  if (error instanceof CclogError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new CclogError(errorMessage, 'UNKNOWN', error);
}
