import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { ErrorResponse } from '../types';

// Validation middleware that runs validators and handles errors
export const validate = (validations: ValidationChain[]) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((validation) => validation.run(req)));

    const errors = validationResult(req);

    if (errors.isEmpty()) {
      next();
      return;
    }

    // Only the first message per field, joined into one detail string
    const messages = errors.array({ onlyFirstError: true }).map((error) => String(error.msg));

    const response: ErrorResponse = {
      detail: messages.join('; '),
    };

    res.status(400).json(response);
  };
};

export default validate;
