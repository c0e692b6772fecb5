import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger.js';
import { requestCounter, responseTimeHistogram } from '../metrics/metrics.js';

const routeLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : 'unmatched';
};

const instrumentMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  logger.info(`Request received: ${req.method} ${req.originalUrl}`);
  const stopTimer = responseTimeHistogram.startTimer();

  res.on('finish', () => {
    const labels = { method: req.method, path: routeLabel(req), status: String(res.statusCode) };
    requestCounter.inc(labels);
    stopTimer(labels);
    logger.debug(`Request completed: ${req.method} ${req.originalUrl} -> ${res.statusCode}`);
  });

  next();
};

export default instrumentMiddleware;
