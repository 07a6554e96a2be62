/**
 * Error codes used throughout the evaluation harness.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'HttpError'
  | 'TimeoutError'
  | 'ProcessError'
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
 * Base error class for all harness errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('HttpError', 'Platform request failed', {
 *   cause: originalError,
 *   details: { statusCode: 502, path: '/prompt-templates' }
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
 * Error thrown when configuration or a scenario definition is invalid or missing.
 * User-correctable - suggests fixing the environment or scenario file.
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
 * Error thrown for HTTP-related failures.
 */
export class HttpError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('HttpError', message, options);
  }
}

/**
 * Error thrown when a request to the remote platform fails.
 * `reachable` is false when no HTTP response was received at all.
 */
export class PlatformRequestError extends HttpError {
  /** Whether the platform answered at all */
  public readonly reachable: boolean;
  /** HTTP status of the response, when one was received */
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: AppErrorOptions & { reachable: boolean; statusCode?: number },
  ) {
    super(message, options);
    this.reachable = options.reachable;
    this.statusCode = options.statusCode;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when a subprocess cannot be started or fails.
 * Includes the process exit code when available.
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
 * Renders any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
