/**
 * Process exit codes, one per fatal call site.
 */
export enum ExitCode {
  SUCCESS = 0,
  INVALID_PARAMS = 1,
  CSV_FETCH_FAILED = 2,
  CSV_FORMAT_FAILED = 3,
  REMOTE_COUNT_FAILED = 4,
  ACTIVITY_MAP_FAILED = 5,
  REMOTE_CLEAN_FAILED = 6,
  REMOTE_CREATE_FAILED = 7,
  UNEXPECTED_FAILURE = 8,
}

export class SyncError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SyncError';
    this.exitCode = exitCode;
  }
}

export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message, ExitCode.INVALID_PARAMS);
    this.name = 'ConfigError';
  }
}

export class FetchError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, ExitCode.CSV_FETCH_FAILED, cause);
    this.name = 'FetchError';
  }
}

export class FormatError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, ExitCode.CSV_FORMAT_FAILED, cause);
    this.name = 'FormatError';
  }
}

/**
 * Failure of a single API call. The exit code is decided by whoever catches it,
 * so it defaults to the count failure until the engine re-throws it.
 */
export class RemoteError extends SyncError {
  public readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, ExitCode.REMOTE_COUNT_FAILED, cause);
    this.name = 'RemoteError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'An unknown error occurred';
}

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof SyncError ? error.exitCode : ExitCode.UNEXPECTED_FAILURE;
}
