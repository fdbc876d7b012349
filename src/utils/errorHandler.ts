// utils/errorHandler.ts
import { NextApiResponse } from 'next';
import { ErrorCode, isAppError } from '../types/access';
import { createLogger } from './loggers';

const logger = createLogger('errorHandler');

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.EMPLOYEE_NOT_FOUND]: 404,
  [ErrorCode.TOOL_NOT_FOUND]: 404,
  [ErrorCode.PERIOD_MISMATCH]: 400,
  [ErrorCode.INVALID_DATE_RANGE]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_EVENT]: 400,
  [ErrorCode.DATA_FETCH_ERROR]: 503,
};

export interface ErrorBody {
  status: 'error';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export function toErrorResponse(err: unknown): {
  statusCode: number;
  body: ErrorBody;
} {
  if (isAppError(err)) {
    return {
      statusCode: STATUS_BY_CODE[err.code] ?? 500,
      body: {
        status: 'error',
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      status: 'error',
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    },
  };
}

export const handleError = (err: unknown, res: NextApiResponse) => {
  const { statusCode, body } = toErrorResponse(err);

  if (statusCode >= 500) {
    logger.error(body.message, {
      code: body.code,
      error: err instanceof Error ? err.stack : String(err),
    });
  } else {
    logger.warn(body.message, { code: body.code, details: body.details });
  }

  res.status(statusCode).json(body);
};
