import { Router, Request, Response } from 'express';
import { createCarrierRoutes } from './carrierRoutes';
import { createLoadRoutes } from './loadRoutes';
import { createCarrierController } from '../controllers/carrierController';
import { createLoadController } from '../controllers/loadController';
import { CarrierValidator } from '../services/carrierValidationService';
import { LoadTable } from '../services/loadTableService';
import { config } from '../config';

export interface RouteDependencies {
  carrierValidator: CarrierValidator;
  loadTable: LoadTable;
}

export const createRoutes = ({ carrierValidator, loadTable }: RouteDependencies): Router => {
  const router = Router();

  // ============================================
  // Health Check Endpoints
  // ============================================

  /**
   * Basic liveness check
   * Returns 200 if the server is running
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      message: 'Carrier & load lookup API is running',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  /**
   * Readiness check
   * Ready once the load table holds at least one record
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const isReady = loadTable.isAvailable;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'unavailable',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      services: {
        loadTable: {
          status: isReady ? 'loaded' : 'empty',
          records: loadTable.size,
        },
        fmcsa: {
          status: config.fmcsa.apiKey ? 'configured' : 'missing_api_key',
        },
      },
    });
  });

  // ============================================
  // Mount API Routes
  // ============================================

  router.use('/carriers', createCarrierRoutes(createCarrierController(carrierValidator)));
  router.use('/items', createLoadRoutes(createLoadController(loadTable)));

  return router;
};

export default createRoutes;
