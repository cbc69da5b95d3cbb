import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('request');

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  res.on('finish', () => {
    log.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`);
  });
  next();
};
