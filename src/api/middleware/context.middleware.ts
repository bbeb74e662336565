import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { withContext } from '../../utils/logger.js';

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Middleware to add logging context to all requests
 * The correlationId is echoed back so clients can quote it
 */
export const contextMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers[CORRELATION_HEADER];
  const correlationId = typeof header === 'string' && header !== '' ? header : randomUUID();

  res.setHeader(CORRELATION_HEADER, correlationId);

  // Run the rest of the request with context
  withContext({ correlationId }, () => next());
};
