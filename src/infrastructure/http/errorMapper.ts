import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  AppError,
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  logger
} from '@observatory/shared';

interface ErrorResponseBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

function mapStatusCode(error: unknown): number {
  if (error instanceof ZodError) return 422;
  if (error instanceof ValidationError) return 422;
  if (error instanceof ConflictError) return 409;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof UnauthorizedError) return 401;
  if (error instanceof AppError) return error.status;
  if (isBodyParserError(error)) return 400;
  return 500;
}

/** express.json() rejects malformed bodies with a `status` of 400. */
function isBodyParserError(error: unknown): boolean {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

export function errorMapper(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = mapStatusCode(err);
  const requestLogger = res.locals.logger ?? logger;
  const logFields = { err, status, path: req.path, method: req.method };

  if (status >= 500) {
    requestLogger.error(logFields, 'Request failed');
  } else {
    requestLogger.warn(logFields, 'Request rejected');
  }

  if (res.headersSent) {
    return;
  }

  const message =
    err instanceof ZodError
      ? 'Invalid request payload'
      : err instanceof Error && (status < 500 || err instanceof AppError)
        ? err.message
        : 'Unexpected error while processing request';
  const body: ErrorResponseBody = {
    error:
      err instanceof AppError
        ? err.name
        : err instanceof ZodError
          ? 'ValidationError'
          : status === 400
            ? 'BadRequestError'
            : 'InternalServerError',
    message
  };

  if (err instanceof AppError && err.details) {
    body.details = err.details;
  }

  if (err instanceof ZodError) {
    body.details = { issues: err.issues };
  }

  res.status(status).json(body);
}
