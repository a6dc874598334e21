import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { ErrorCode, toErrorResponse } from '../utils/errors';

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'status' in err && err.status === 400;

/**
 * Errors that escape a handler, such as a malformed JSON body.
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: 'Malformed JSON body', code: ErrorCode.VALIDATION_ERROR });
  }

  const { status, body } = toErrorResponse(err, 'An unexpected error occurred');

  if (status >= 500) {
    logger.error('Unhandled error', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method
    });
  }

  res.status(status).json(body);
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: ErrorCode.NOT_FOUND });
};
