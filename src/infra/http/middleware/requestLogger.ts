import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '../../logger.js';

/**
 * One log line per finished response.
 */
export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const entry = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10,
      };
      if (res.statusCode >= 500) {
        logger.error(entry, 'request failed');
      } else {
        logger.info(entry, 'request completed');
      }
    });
    next();
  };
}
