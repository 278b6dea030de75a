import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

export const SLOW_RESPONSE_MS = 200;

export const performanceMonitor = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const line = `${req.method} ${req.originalUrl} ${res.statusCode} - ${duration}ms`;

    if (duration > SLOW_RESPONSE_MS) {
      logger.warn(`Slow API response: ${line}`);
    } else {
      logger.debug(line);
    }
  });

  next();
};

export default performanceMonitor;
