import { randomUUID } from 'crypto';
import { pinoHttp } from 'pino-http';
import { logger } from '../../utils/logger.js';
import { CORRELATION_HEADER } from './context.middleware.js';

/**
 * HTTP request/response logging middleware
 */
export const loggingMiddleware = pinoHttp({
  logger,

  // Reuse the correlation id set by contextMiddleware
  genReqId: (req, res) => {
    const id = res.getHeader(CORRELATION_HEADER);
    return typeof id === 'string' ? id : randomUUID();
  },

  // Health probes would drown everything else
  autoLogging: {
    ignore: (req) => req.url === '/health',
  },

  // Customize log level based on status code
  customLogLevel: (req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },

  serializers: {
    req: (req) => ({
      method: req.method,
      url: req.url,
      headers: {
        'user-agent': req.headers['user-agent'],
        'content-type': req.headers['content-type'],
      },
    }),
    res: (res) => ({
      statusCode: res.statusCode,
    }),
  },

  // Redact sensitive headers
  redact: ['req.headers.authorization', 'req.headers.cookie'],
});
