import { Request, Response, NextFunction } from 'express';
import { requestCounter, responseTimeHistogram } from '../metrics/metrics.js';
import logger from '../utils/logger.js';

const routeLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : 'unmatched';
};

const instrumentMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const endTimer = responseTimeHistogram.startTimer();
  logger.debug(`Request received: ${req.method} ${req.originalUrl}`);

  res.on('finish', () => {
    const labels = { method: req.method, path: routeLabel(req), status: String(res.statusCode) };
    endTimer(labels);
    requestCounter.inc(labels);
  });

  next();
};

export default instrumentMiddleware;
