/**
 * Stages a backup run can fail in. Every fatal error carries one of these so the
 * entry point can name the failing step and pick an exit code.
 */
export type BackupStage =
  | 'configuration'
  | 'connection_string'
  | 'credentials'
  | 'connectivity'
  | 'dump'
  | 'compression'
  | 'upload'
  | 'filesystem';

/**
 * Base class for every fatal error raised during a backup run
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly stage: BackupStage,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ConfigurationError extends BackupError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export class MalformedUrlError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'connection_string', cause);
    this.name = 'MalformedUrlError';
  }
}

export class MissingCredentialError extends BackupError {
  constructor(message: string) {
    super(message, 'credentials');
    this.name = 'MissingCredentialError';
  }
}

export class ConnectivityError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'connectivity', cause);
    this.name = 'ConnectivityError';
  }
}

export class DumpToolError extends BackupError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, 'dump', cause);
    this.name = 'DumpToolError';
  }
}

export class CompressionError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'compression', cause);
    this.name = 'CompressionError';
  }
}

export class UploadError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'upload', cause);
    this.name = 'UploadError';
  }
}

export class FilesystemError extends BackupError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: Error
  ) {
    super(message, 'filesystem', cause);
    this.name = 'FilesystemError';
  }
}

/**
 * Format an unknown thrown value for log lines and wrapped error messages
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Narrow an unknown thrown value to an Error so it can be chained as a cause
 */
export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
