import { Request, Response, NextFunction } from 'express';
import { ApiError, RegistryError, errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

function toApiError(err: Error): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof RegistryError) {
    return errors.fromRegistry(err);
  }
  return errors.internal();
}

/**
 * Centralized error handling middleware. Every failure leaves as `{ detail }`;
 * internal error messages are logged but never sent to the client.
 */
export const createErrorHandler = () => {
  return (err: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    const apiError = toApiError(err);
    const logContext = {
      tags: ['http', 'error'],
      method: req.method,
      url: req.originalUrl,
      statusCode: apiError.statusCode,
      code: apiError.code
    };

    if (apiError.statusCode >= 500) {
      logger.error('Request failed', { ...logContext, error: err.message, stack: err.stack });
    } else if (err instanceof RegistryError) {
      // the registry already logged the rejection with its activity and email
      logger.debug('Request rejected', { ...logContext, detail: apiError.detail });
    } else {
      logger.warn('Request rejected', { ...logContext, detail: apiError.detail });
    }

    res.status(apiError.statusCode).json({ detail: apiError.detail });
  };
};

export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(errors.notFound());
};
