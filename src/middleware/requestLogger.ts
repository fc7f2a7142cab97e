import { Request, Response, NextFunction } from 'express';

import { logger, LogContext, Logger } from '../utils/logger';

// Extend Express Request interface to include logging properties
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

/**
 * Generate a unique correlation ID for request tracing.
 */
function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `req-${timestamp}-${random}`;
}

/**
 * Extract headers worth logging.
 */
function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  if (req.headers['content-type']) {
    headers.contentType = req.headers['content-type'];
  }
  if (req.headers['content-length']) {
    headers.contentLength = req.headers['content-length'];
  }
  if (req.headers['user-agent']) {
    headers.userAgent = req.headers['user-agent'];
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches logger to request, logs request/response.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = generateCorrelationId();
  req.startTime = Date.now();
  req.log = logger.child(req.correlationId);

  req.log.info('Incoming request', {
    method: req.method,
    path: req.path,
    query: Object.keys(req.query).length > 0 ? req.query : undefined,
    headers: getSafeHeaders(req),
    ip: req.ip ?? req.socket.remoteAddress,
  });

  res.on('finish', () => {
    const durationMs = Date.now() - req.startTime;
    const statusCode = res.statusCode;

    const context: LogContext = {
      method: req.method,
      path: req.path,
      statusCode,
      durationMs,
      contentLength: res.get('content-length'),
    };

    // Determine log level based on status code
    if (statusCode >= 500) {
      req.log.error('Request completed', undefined, context);
    } else if (statusCode >= 400) {
      req.log.warn('Request completed', context);
    } else {
      req.log.info('Request completed', context);
    }
  });

  next();
}
