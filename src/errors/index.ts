/**
 * Custom error types for deployment orchestration.
 *
 * Command execution never throws; these cover configuration problems and
 * missing prerequisites, which are caught at the pipeline or CLI boundary.
 */

export const ErrorCodes = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  PREREQUISITE_NOT_MET: 'PREREQUISITE_NOT_MET',
  STAGE_FAILED: 'STAGE_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    timestamp: Date;
    context: Record<string, unknown>;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Error thrown when configuration cannot be read or is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    code: ErrorCode = ErrorCodes.CONFIG_INVALID,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a required directory, file or cluster state is absent
 */
export class PrerequisiteError extends ApplicationError {
  constructor(
    message: string,
    public readonly requirement: string,
    context?: Record<string, unknown>,
  ) {
    super(message, ErrorCodes.PREREQUISITE_NOT_MET, { ...context, requirement });
    this.name = 'PrerequisiteError';
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
