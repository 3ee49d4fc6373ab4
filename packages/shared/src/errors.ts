/**
 * Error codes used throughout the evaluator.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ConnectionError'
  | 'RequestFailedError'
  | 'ProtocolError'
  | 'RunnerError'
  | 'ExtractionError'
  | 'PublishError'
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
 * Base error class for all evaluator errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('RunnerError', 'docker compose up failed', {
 *   cause: originalError,
 *   details: { exitCode: 1 }
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
 * Error thrown when local configuration or credentials are invalid or missing.
 * User-correctable - the message says what to fix.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Transport-level failure talking to the challenge server.
 * Transient: the poll loop backs off and tries again.
 */
export class ConnectionError extends AppError {
  /** HTTP status, when the server answered at all */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('ConnectionError', message, options);
    this.status = options.status;
  }
}

/**
 * The challenge server answered but rejected the request.
 */
export class RequestFailedError extends AppError {
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('RequestFailedError', message, options);
    this.status = options.status;
  }
}

/**
 * A job payload uses a protocol or shape this evaluator cannot run.
 * Not retried; the job is reported with status error.
 */
export class ProtocolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProtocolError', message, options);
  }
}

export type RunnerStep = 'pull' | 'up';

/**
 * The compose pipeline exited non-zero.
 */
export class RunnerError extends AppError {
  public readonly step: RunnerStep;
  public readonly exitCode?: number;

  constructor(
    step: RunnerStep,
    message: string,
    options: AppErrorOptions & { exitCode?: number } = {},
  ) {
    super('RunnerError', message, options);
    this.step = step;
    this.exitCode = options.exitCode;
  }
}

/**
 * The evaluator's results file is missing or malformed.
 */
export class ExtractionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ExtractionError', message, options);
  }
}

/**
 * Building, inspecting or pushing the artifact image failed.
 */
export class PublishError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PublishError', message, options);
  }
}

/**
 * Error thrown when a subprocess fails.
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

/** Coerces any thrown value into an Error. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}

/** `Name: message` followed by the stack frames. */
function renderError(err: Error): string {
  const frames = (err.stack ?? '')
    .split('\n')
    .filter((line) => line.trimStart().startsWith('at '));
  return [`${err.name}: ${err.message}`, ...frames].join('\n');
}

/**
 * Renders an error with its stack frames and details, followed by its causes.
 */
export function describeError(value: unknown): string {
  const lines: string[] = [];
  let current: unknown = value;
  let depth = 0;

  while (current !== undefined && depth < 5) {
    const err = toError(current);
    const header = depth === 0 ? '' : 'Caused by: ';
    lines.push(header + renderError(err));
    if (err instanceof AppError && err.details !== undefined) {
      lines.push(
        typeof err.details === 'string' ? err.details : JSON.stringify(err.details, null, 2),
      );
    }
    current = err.cause;
    depth++;
  }

  return lines.join('\n');
}
