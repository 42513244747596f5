import { Request, Response, NextFunction, RequestHandler } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { ValidationError } from '../utils/errors';

/**
 * Handle validation errors
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const details = errors.array().map((error) => ({
      field: error.type === 'field' ? error.path : error.type,
      message: String(error.msg),
    }));

    return next(new ValidationError(details[0].message, details));
  }

  next();
};

/**
 * Run the chains, then reject the request if any of them failed
 */
export const validate = (chains: ValidationChain[]): RequestHandler[] => [...chains, handleValidationErrors];
