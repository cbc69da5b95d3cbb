import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors/app-error.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('http');

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof AppError) {
    res.status(err.status).json({ status: 'error', code: err.code, message: err.message, ...(err.details ? { details: err.details } : {}) });
    return;
  }

  // body-parser marks malformed JSON with a 4xx status
  const status = 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : 500;
  if (status < 500) {
    res.status(status).json({ status: 'error', code: 'invalid_params', message: err.message });
    return;
  }

  log.error('unhandled error', { method: req.method, url: req.originalUrl, error: err.message, stack: err.stack });
  res.status(500).json({ status: 'error', code: 'internal_error', message: 'internal error' });
};
