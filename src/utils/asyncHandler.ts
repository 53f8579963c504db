import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forwards rejections from async handlers to the error middleware. */
export const asyncHandler =
  (handler: AsyncRoute): RequestHandler =>
  (req, res, next: NextFunction) => {
    handler(req, res).catch(next);
  };
