import http from 'http';
import { config, validateConfig } from './config';
import { createApp } from './app';
import { setupGlobalErrorHandlers } from './middleware/errorHandler';
import { createCarrierValidator } from './services/carrierValidationService';
import { LoadTable } from './services/loadTableService';
import logger from './utils/logger';

// ============================================
// Setup Global Error Handlers
// ============================================
setupGlobalErrorHandlers();

let httpServer: http.Server | undefined;

// ============================================
// Start Server
// ============================================
const startServer = async (): Promise<void> => {
  logger.info('Starting carrier & load lookup API...');

  validateConfig().forEach((warning) => logger.warn(`Configuration warning: ${warning}`));

  // The table is complete before the first request can arrive
  const loadTable = await LoadTable.fromFile(config.loads.csvPath);
  if (!loadTable.isAvailable) {
    logger.warn(`Load data is empty. Check '${config.loads.csvPath}'`);
  }

  const app = createApp({
    carrierValidator: createCarrierValidator(),
    loadTable,
  });

  const server = http.createServer(app);
  httpServer = server;

  server.listen(config.port, () => {
    logger.info('Server started successfully', {
      port: config.port,
      environment: config.nodeEnv,
      loads: loadTable.size,
      fmcsaConfigured: Boolean(config.fmcsa.apiKey),
    });
  });
};

// ============================================
// Graceful Shutdown
// ============================================
const shutdown = (signal: string): void => {
  logger.info(`${signal} received - initiating graceful shutdown...`);

  const forceTimeout = setTimeout(() => {
    logger.error('Forceful shutdown due to timeout');
    process.exit(1);
  }, 10000);

  if (!httpServer) {
    process.exit(0);
  }

  httpServer.close((error) => {
    clearTimeout(forceTimeout);
    if (error) {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
