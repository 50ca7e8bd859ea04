/**
 * AgroCarbon - Request Logging Middleware
 */

import type { Request, Response, NextFunction } from 'express';
import log from '../../utils/logger';

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on('finish', () => {
    log.response(req.method, req.originalUrl, res.statusCode, Date.now() - start);
  });
  next();
}
