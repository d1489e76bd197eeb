import { Request, Response, NextFunction } from 'express';
import { ErrorResponse } from '../types';
import { config } from '../config';
import logger, { logError } from '../utils/logger';

// ============================================
// Custom Error Classes
// ============================================

// Base application error
export class AppError extends Error {
  statusCode: number;
  code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.name = this.constructor.name;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Malformed client input (400)
export class InvalidFormatError extends AppError {
  constructor(message: string = 'Invalid format') {
    super(message, 400, 'INVALID_FORMAT');
  }
}

// No matching record (404)
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

// Required credential absent (500)
export class ConfigurationMissingError extends AppError {
  constructor(message: string = 'Required configuration missing') {
    super(message, 500, 'CONFIGURATION_MISSING');
  }
}

// External registry returned an unexpected status (500)
export class UpstreamError extends AppError {
  upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super(message, 500, 'UPSTREAM_ERROR');
    this.upstreamStatus = upstreamStatus;
  }
}

// Dependent data never loaded (500)
export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable') {
    super(message, 500, 'SERVICE_UNAVAILABLE');
  }
}

// Uncategorized failure (500)
export class InternalServerError extends AppError {
  constructor(message: string = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR');
  }
}

// Message of an unknown thrown value
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// ============================================
// Global Error Handler Middleware
// ============================================

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode = 500;
  let detail = 'Internal server error';

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    detail = err.message;
  }
  // body-parser marks malformed JSON with a body property
  else if (err instanceof SyntaxError && 'body' in err) {
    statusCode = 400;
    detail = 'Invalid JSON in request body';
  } else {
    logError('Unexpected error', err, {
      requestId: req.requestId,
      path: req.path,
      method: req.method,
    });
    detail = config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : err.message || detail;
  }

  if (statusCode >= 500) {
    logger.error(`${statusCode} ${req.method} ${req.path}: ${detail}`, {
      requestId: req.requestId,
      statusCode,
      code: err instanceof AppError ? err.code : undefined,
    });
  }

  const response: ErrorResponse = { detail };
  res.status(statusCode).json(response);
};

// ============================================
// Async Handler Wrapper
// ============================================

export const asyncHandler = <T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// ============================================
// 404 Handler for Unknown Routes
// ============================================

export const notFoundHandler = (req: Request, res: Response): void => {
  const response: ErrorResponse = {
    detail: `Route ${req.method} ${req.originalUrl} not found`,
  };
  res.status(404).json(response);
};

// ============================================
// Unhandled Rejection & Exception Handlers
// ============================================

export const setupGlobalErrorHandlers = (): void => {
  process.on('unhandledRejection', (reason: unknown) => {
    logError('Unhandled Promise Rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });

  process.on('uncaughtException', (error: Error) => {
    logError('Uncaught Exception', error);

    // Uncaught exceptions are severe - always exit
    logger.error('Uncaught exception - initiating immediate shutdown');
    setTimeout(() => process.exit(1), 1000);
  });
};

export default AppError;
