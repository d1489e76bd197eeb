import { Router } from 'express';
import { query } from 'express-validator';
import { validate } from '../middleware/validate';
import { CarrierController } from '../controllers/carrierController';

export const createCarrierRoutes = (controller: CarrierController): Router => {
  const router = Router();

  router.get(
    '/validate',
    validate([
      query('mc_number')
        .exists()
        .withMessage('mc_number query parameter is required'),
    ]),
    controller.validateCarrier
  );

  return router;
};

export default createCarrierRoutes;
