import { Request, Response, NextFunction } from 'express';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ApiError } from '../../utils/errors.js';

/**
 * REST API Error Response Format
 */
export interface ErrorResponse {
  error: {
    message: string;
    field?: string;
  };
}

/**
 * express.json() rejects unparseable or oversized bodies with errors
 * carrying a `type` of `entity.*` and an HTTP `status`
 */
function bodyParserStatus(error: unknown): number | null {
  if (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    error.type.startsWith('entity.') &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    return error.status;
  }
  return null;
}

/**
 * Generic Error Handling Middleware
 *
 * This middleware knows about ApiError and the body parser's errors.
 * Store errors are converted to ApiError in the document store.
 */
export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  // Log all errors
  logger.error(
    {
      err: error,
      method: req.method,
      path: req.path,
      query: req.query,
      body: req.body,
    },
    'Request error'
  );

  // user facing errors
  if (error instanceof ApiError) {
    res.status(error.statusCode).json({
      error: {
        message: error.message,
        field: error.field,
      },
    });
    return;
  }

  const parserStatus = bodyParserStatus(error);
  if (parserStatus !== null) {
    res.status(parserStatus).json({
      error: {
        message: parserStatus === 413 ? 'Request body too large' : 'Malformed JSON body',
      },
    });
    return;
  }

  // For any other error, return 500
  // In production, hide error details
  const message =
    config.nodeEnv === 'production'
      ? 'Internal server error'
      : error instanceof Error
        ? error.message
        : 'Unknown error';

  res.status(500).json({
    error: {
      message,
    },
  });
}
