import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger, { logHttp, logPerformance, LogMetadata } from '../utils/logger';
import { config } from '../config';

// Extend Express Request to include custom properties
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
    }
  }
}

/**
 * Get client IP address
 */
const getClientIp = (req: Request): string => {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const ip = typeof forwarded === 'string' ? forwarded : forwarded[0];
    return ip.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
};

const assignRequestId = (req: Request, res: Response): string => {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header ? header : uuidv4();
  req.requestId = requestId;
  req.startTime = Date.now();
  res.setHeader('X-Request-ID', requestId);
  return requestId;
};

/**
 * Request logging middleware
 * Logs every request when its response finishes
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = assignRequestId(req, res);
  const startTime = Date.now();

  if (config.isDevelopment) {
    logger.debug('Incoming request', {
      requestId,
      method: req.method,
      path: req.path,
      query: Object.keys(req.query).length > 0 ? req.query : undefined,
      ip: getClientIp(req),
    });
  }

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const statusCode = res.statusCode;

    const logData: LogMetadata = {
      requestId,
      method: req.method,
      path: req.path,
      statusCode,
      duration: `${duration}ms`,
      ip: getClientIp(req),
    };

    if (Object.keys(req.query).length > 0) {
      logData.query = req.query;
    }

    if (statusCode >= 400) {
      logData.userAgent = req.headers['user-agent'];
    }

    if (statusCode >= 500) {
      logger.error(`${req.method} ${req.path} ${statusCode}`, logData);
    } else if (statusCode >= 400) {
      logger.warn(`${req.method} ${req.path} ${statusCode}`, logData);
    } else {
      logHttp(`${req.method} ${req.path} ${statusCode}`, logData);
    }

    if (duration > 1000) {
      logPerformance(`Slow request: ${req.method} ${req.path}`, duration, {
        requestId,
        statusCode,
      });
    }
  });

  next();
};

/**
 * Error logging middleware
 * Should be placed after routes but before error handler
 */
export const errorLogger = (err: Error, req: Request, _res: Response, next: NextFunction): void => {
  const duration = req.startTime ? Date.now() - req.startTime : 0;

  logger.error(`Request error: ${err.message}`, {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    duration: `${duration}ms`,
    ip: getClientIp(req),
    error: {
      name: err.name,
      message: err.message,
      stack: config.isDevelopment ? err.stack : undefined,
    },
  });

  next(err);
};

/**
 * Skip logging for certain paths
 */
export const skipPaths = ['/health', '/favicon.ico'];

/**
 * Conditional request logger that skips certain paths
 */
export const conditionalRequestLogger = (req: Request, res: Response, next: NextFunction): void => {
  if (skipPaths.some(path => req.path.startsWith(path))) {
    // Still assign request ID even when skipping logs
    assignRequestId(req, res);
    return next();
  }

  return requestLogger(req, res, next);
};

export default requestLogger;
