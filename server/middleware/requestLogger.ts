import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../../simulation/utils/log.js';

const log = createLogger('admin');

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = performance.now();
  res.on('finish', () => {
    const ms = Math.round(performance.now() - start);
    log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${ms}ms`);
  });
  next();
}
