/**
 * Structured errors for the release workflow.
 *
 * Every failure carries a code and the process exit code the CLI should
 * terminate with.
 */

export const ErrorCodes = {
  // Argument and configuration errors
  MISSING_ARGUMENT: 'MISSING_ARGUMENT',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Engine errors
  DAEMON_UNREACHABLE: 'DAEMON_UNREACHABLE',
  ENGINE_NOT_FOUND: 'ENGINE_NOT_FOUND',
  BUILD_FAILED: 'BUILD_FAILED',
  TAG_FAILED: 'TAG_FAILED',
  LOGIN_FAILED: 'LOGIN_FAILED',
  PUSH_FAILED: 'PUSH_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all release failures
 */
export class ReleaseError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: number;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    options: { exitCode?: number; details?: Record<string, unknown>; cause?: Error } = {},
  ) {
    super(message);
    this.name = 'ReleaseError';
    this.code = code;
    // Exit codes outside 1..255 would read as success or wrap around.
    const exitCode = options.exitCode ?? 1;
    this.exitCode = exitCode >= 1 && exitCode <= 255 ? exitCode : 1;
    this.details = options.details ?? {};
    this.cause = options.cause;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      details: this.details,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }
}

/**
 * Argument errors are reported before any side effect
 */
export class UsageError extends ReleaseError {
  constructor(message: string, code: ErrorCode = ErrorCodes.INVALID_ARGUMENT) {
    super(message, code, { exitCode: 1 });
    this.name = 'UsageError';
  }
}

/**
 * Wrap anything thrown into a ReleaseError
 */
export function toReleaseError(error: unknown, code: ErrorCode = ErrorCodes.INTERNAL_ERROR): ReleaseError {
  if (error instanceof ReleaseError) {
    return error;
  }
  if (error instanceof Error) {
    return new ReleaseError(error.message, code, { cause: error });
  }
  return new ReleaseError(String(error), code);
}
