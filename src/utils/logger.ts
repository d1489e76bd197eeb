import winston from 'winston';
import path from 'path';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, requestId, ...metadata }) => {
  let msg = `${timestamp} [${level}]`;

  if (requestId) {
    msg += ` [${requestId}]`;
  }

  msg += `: ${message}`;

  const metaKeys = Object.keys(metadata).filter(key => key !== 'stack' && key !== 'service');
  if (metaKeys.length > 0) {
    const metaStr = metaKeys.map(key => `${key}=${JSON.stringify(metadata[key])}`).join(' ');
    msg += ` ${metaStr}`;
  }

  if (metadata.stack) {
    msg += `\n${metadata.stack}`;
  }

  return msg;
});

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const level = () => (config.isDevelopment ? 'debug' : 'info');

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: config.isTest,
    format: combine(
      colorize({ all: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      errors({ stack: true }),
      consoleFormat
    ),
  }),
];

// Add file transports in production
if (config.isProduction) {
  const logsDir = path.join(process.cwd(), 'logs');

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: combine(timestamp(), errors({ stack: true }), json()),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'access.log'),
      level: 'http',
      format: combine(timestamp(), json()),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 10,
    })
  );
}

const logger = winston.createLogger({
  level: level(),
  levels,
  defaultMeta: { service: 'carrier-load-api' },
  transports,
  exitOnError: false,
});

export type LogMetadata = Record<string, unknown>;

export const logError = (message: string, error?: Error, metadata?: LogMetadata) => {
  logger.error(message, {
    ...metadata,
    ...(error && {
      errorMessage: error.message,
      errorName: error.name,
      stack: error.stack,
    }),
  });
};

export const logWarn = (message: string, metadata?: LogMetadata) => {
  logger.warn(message, metadata);
};

export const logInfo = (message: string, metadata?: LogMetadata) => {
  logger.info(message, metadata);
};

export const logHttp = (message: string, metadata?: LogMetadata) => {
  logger.http(message, metadata);
};

export const logDebug = (message: string, metadata?: LogMetadata) => {
  logger.debug(message, metadata);
};

// Outbound registry calls: failures and 5xx at warn, the rest at debug
export const logUpstreamCall = (
  upstream: string,
  status: number | 'failed',
  duration: number,
  metadata?: LogMetadata
) => {
  const callLevel = status === 'failed' || status >= 500 ? 'warn' : 'debug';
  logger.log(callLevel, `UPSTREAM: ${upstream} ${status}`, {
    upstream,
    upstreamStatus: status,
    duration: `${duration}ms`,
    ...metadata,
  });
};

export const logPerformance = (operation: string, duration: number, metadata?: LogMetadata) => {
  const perfLevel = duration > 1000 ? 'warn' : 'debug';
  logger.log(perfLevel, `PERFORMANCE: ${operation}`, {
    performance: true,
    duration: `${duration}ms`,
    slow: duration > 1000,
    ...metadata,
  });
};

export default logger;
