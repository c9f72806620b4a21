import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedAccessError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { ProfileRequiredError, ValidationError } from '../../../domain/errors.js';
import { logger as defaultLogger, type Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

/** body-parser tags its errors with a `type` string. */
function bodyParserErrorType(err: Error): string | null {
  if ('type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return null;
}

export function mapError(err: Error): MappedError | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (err instanceof ValidationError) {
    return {
      status: 400,
      body: {
        code: 'INVALID_ENTITY',
        message: err.message,
        ...(err.field ? { details: { field: err.field } } : {}),
      },
    };
  }

  if (err instanceof ProfileRequiredError) {
    return { status: 400, body: { code: 'PROFILE_REQUIRED', message: err.message } };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof ForbiddenError) {
    return { status: 403, body: { code: 'FORBIDDEN', message: err.message } };
  }

  if (err instanceof UnauthorizedAccessError) {
    return { status: 403, body: { code: 'ACCESS_DENIED', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof ConflictError) {
    return { status: 409, body: { code: 'CONFLICT', message: err.message } };
  }

  switch (bodyParserErrorType(err)) {
    case 'entity.too.large':
      return {
        status: 413,
        body: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
      };
    case 'entity.parse.failed':
      return {
        status: 400,
        body: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
      };
    default:
      return null;
  }
}

export function createErrorHandler(logger: Logger = defaultLogger) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const mapped = mapError(err);
    if (mapped) {
      logger.debug({ code: mapped.body.code, path: req.path }, err.message);
      res.status(mapped.status).json(mapped.body);
      return;
    }

    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}

export const errorHandler = createErrorHandler();
