import { Request, Response } from 'express';
import { CarrierValidator } from '../services/carrierValidationService';
import { asyncHandler, InvalidFormatError } from '../middleware/errorHandler';
import { CarrierValidationResult } from '../types';

export const createCarrierController = (validator: CarrierValidator) => {
  // Validate carrier by MC number (query parameter, may carry an "MC" prefix)
  const validateCarrier = asyncHandler(async (req: Request, res: Response) => {
    const mcNumber = req.query.mc_number;

    // Repeated parameters arrive as an array
    if (typeof mcNumber !== 'string') {
      throw new InvalidFormatError('mc_number must be a single string value');
    }

    const result: CarrierValidationResult = await validator.validate(mcNumber);

    res.json(result);
  });

  return { validateCarrier };
};

export type CarrierController = ReturnType<typeof createCarrierController>;
