import type { NextFunction, Request, Response } from 'express';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards errors to next().
 */
export function asyncHandler<TRequest extends Request = Request>(
  fn: (req: TRequest, res: Response, next: NextFunction) => Promise<unknown>
): (req: TRequest, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
