import { NextFunction, Request, RequestHandler, Response } from "express";

// Express 4 does not forward rejected promises to the error handler on its own
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };
