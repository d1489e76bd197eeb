import { Router } from 'express';
import { LoadController } from '../controllers/loadController';

export const createLoadRoutes = (controller: LoadController): Router => {
  const router = Router();

  router.get('/:referenceNumber', controller.getLoad);

  return router;
};

export default createLoadRoutes;
