import { Request, Response, NextFunction } from 'express';
import HttpError from '../errors/HttpError.js';
import logger from '../utils/logger.js';

const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof HttpError) {
    if (err.status >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed: ${err.message}`);
    } else {
      logger.warn(`${req.method} ${req.originalUrl} rejected (${err.status}): ${err.message}`);
    }
    res.status(err.status).json({ error: { message: err.message } });
    return;
  }

  const message = err instanceof Error ? err.message : 'An unexpected error occurred';
  logger.error(`An error occurred: ${message}`);
  res.status(500).json({
    error: {
      message: message || 'An unexpected error occurred',
    },
  });
};

export default errorMiddleware;
