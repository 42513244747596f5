import { Request, Response, NextFunction } from 'express';
import { AppError, NotFoundError, ValidationError, isAppError } from '../utils/errors';
import { logger, logError } from '../utils/logger';

interface ErrorResponseBody {
  success: false;
  error: {
    kind: string;
    code: string;
    message: string;
    details?: unknown;
  };
}

// body-parser tags its errors with `type`
const isBodyParseError = (err: unknown): err is Error & { type: string } =>
  err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';

const isPayloadTooLarge = (err: unknown): err is Error & { type: string } =>
  err instanceof Error && 'type' in err && err.type === 'entity.too.large';

const normalizeError = (err: unknown): AppError => {
  if (isAppError(err)) {
    return err;
  }
  if (isBodyParseError(err)) {
    return new ValidationError('Malformed JSON body');
  }
  if (isPayloadTooLarge(err)) {
    return new AppError('Request body too large', 413, 'PAYLOAD_TOO_LARGE');
  }
  return new AppError('Internal server error', 500, 'INTERNAL_ERROR');
};

/**
 * Global error handler middleware. Responses carry the error kind and code,
 * never a stack trace or crypto material.
 */
export const errorHandler = (err: unknown, req: Request, res: Response<ErrorResponseBody>, _next: NextFunction) => {
  const error = normalizeError(err);

  if (error.statusCode >= 500) {
    logError(err instanceof Error ? err : new Error(String(err)), {
      url: req.originalUrl,
      method: req.method,
      code: error.code,
    });
  } else {
    logger.warn(`${req.method} ${req.originalUrl} -> ${error.statusCode} ${error.code}`);
  }

  res.status(error.statusCode).json({
    success: false,
    error: {
      kind: error.kind,
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
    },
  });
};

/**
 * Not found error handler
 */
export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route not found - ${req.originalUrl}`));
};
