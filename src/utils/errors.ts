import type { Response } from 'express';
import { ZodError } from 'zod';
import { logger } from '../config/logger';

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_RECORD = 'INVALID_RECORD',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export interface ErrorBody {
  error: string;
  code?: string;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found`, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * A product stock record that cannot be reported on as given.
 * `index` is the record's position in the input list.
 */
export class InvalidRecordError extends AppError {
  constructor(
    public field: string,
    public index: number,
    reason: string
  ) {
    super(ErrorCode.INVALID_RECORD, `Invalid record at index ${index}: ${field} ${reason}`, 422, {
      field,
      index
    });
    this.name = 'InvalidRecordError';
  }
}

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;

export const toErrorResponse = (
  error: unknown,
  fallbackMessage: string
): { status: number; body: ErrorBody } => {
  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: error.message,
        code: error.code,
        ...(error.details && { details: error.details })
      }
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Validation failed',
        code: ErrorCode.VALIDATION_ERROR,
        details: {
          errors: error.errors.map((issue) => ({
            field: issue.path.join('.'),
            message: issue.message
          }))
        }
      }
    };
  }

  if (isDuplicateKeyError(error)) {
    return {
      status: 409,
      body: { error: 'Duplicate resource', code: ErrorCode.CONFLICT }
    };
  }

  return {
    status: 500,
    body: { error: fallbackMessage, code: ErrorCode.INTERNAL_ERROR }
  };
};

/**
 * Shared catch-block for controllers. Known errors map to their status;
 * anything else is logged and answered with a 500 and `fallbackMessage`.
 */
export const sendError = (res: Response, error: unknown, fallbackMessage: string): void => {
  const { status, body } = toErrorResponse(error, fallbackMessage);

  if (status >= 500) {
    logger.error(fallbackMessage, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    });
  }

  res.status(status).json(body);
};
