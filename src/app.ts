import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { createRoutes, RouteDependencies } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { conditionalRequestLogger, errorLogger } from './middleware/requestLogger';

/**
 * Build the Express application around an already-loaded table and a
 * carrier validator. Nothing here touches the filesystem or the network.
 */
export const createApp = (dependencies: RouteDependencies): Express => {
  const app = express();

  // Trust Proxy (for correct IP detection behind reverse proxy)
  if (config.isProduction) {
    app.set('trust proxy', 1);
  }

  // ============================================
  // Security Middleware
  // ============================================
  app.use(helmet());

  app.use(
    cors({
      origin: [...config.cors.origins],
      methods: ['GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
      exposedHeaders: ['X-Request-ID'],
    })
  );

  // ============================================
  // Body Parsing & Request Logging
  // ============================================
  app.use(express.json({ limit: '100kb' }));
  app.use(conditionalRequestLogger);

  // ============================================
  // Routes
  // ============================================
  app.use('/', createRoutes(dependencies));

  app.use(errorLogger);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
