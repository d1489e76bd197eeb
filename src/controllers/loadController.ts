import { Request, Response } from 'express';
import { LoadTable } from '../services/loadTableService';
import { asyncHandler } from '../middleware/errorHandler';

export const createLoadController = (loadTable: LoadTable) => {
  // Get load details by reference number
  const getLoad = asyncHandler(async (req: Request, res: Response) => {
    const { referenceNumber } = req.params;

    const load = loadTable.lookup(referenceNumber);

    res.json(load);
  });

  return { getLoad };
};

export type LoadController = ReturnType<typeof createLoadController>;
