import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/**
 * Adapt an async controller to Express 4, which does not await handlers:
 * a rejection is handed to `next` so the error middleware answers it.
 */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
