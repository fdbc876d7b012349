// types/access/error.ts

export enum ErrorCode {
  INVALID_EVENT = 'INVALID_EVENT',
  ANOMALOUS_SEQUENCE = 'ANOMALOUS_SEQUENCE',
  PERIOD_MISMATCH = 'PERIOD_MISMATCH',
  EMPLOYEE_NOT_FOUND = 'EMPLOYEE_NOT_FOUND',
  INVALID_DATE_RANGE = 'INVALID_DATE_RANGE',
  INVALID_INPUT = 'INVALID_INPUT',
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  DATA_FETCH_ERROR = 'DATA_FETCH_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface AppErrorParams {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly originalError?: unknown;

  constructor(params: AppErrorParams) {
    super(params.message);
    this.code = params.code;
    this.details = params.details;
    this.originalError = params.originalError;
    this.name = 'AppError';

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
