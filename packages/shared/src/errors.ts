/**
 * Error codes used throughout testbuilder.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'MissingInput'
  | 'ParseError'
  | 'ProcessError'
  | 'ToolError'
  | 'FilesystemError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all testbuilder errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ParseError', 'Manifest is not a mapping', {
 *   details: { path: 'spec/build/testsuites/validation/model-0.yml' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing testbuilder.yml.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when one or more readiness files of a model are absent.
 * Lists every missing file, not only the first.
 */
export class MissingInputError extends AppError {
  /** The model whose inputs are incomplete */
  public readonly model: string;
  /** File names that were not found */
  public readonly missingFiles: string[];

  constructor(model: string, missingFiles: string[], options: AppErrorOptions = {}) {
    super('MissingInput', `Model "${model}" is missing ${missingFiles.length} required file(s)`, {
      ...options,
      details: options.details ?? { missing: missingFiles },
    });
    this.model = model;
    this.missingFiles = missingFiles;
  }
}

/**
 * Error thrown when the build manifest is absent or malformed.
 */
export class ManifestParseError extends AppError {
  /** Path of the manifest that failed to load */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('ParseError', `Cannot read manifest ${path}: ${message}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when an external tool exits with a non-zero status.
 * Includes the process exit code.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when an external tool could not be started at all.
 */
export class ToolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolError', message, options);
  }
}

/**
 * Error thrown when deleting or copying an artifact fails.
 */
export class FilesystemError extends AppError {
  /** The file the failed operation targeted */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('FilesystemError', message, { ...options, details: options.details ?? { path } });
    this.path = path;
  }
}

/**
 * Whether an error should be reported as user-correctable (exit code 2).
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}
