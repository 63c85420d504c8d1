import type { NextFunction, Request, RequestHandler, Response } from "express";

// Express 4 does not forward rejected promises to the error middleware
export const asyncHandler =
  (
    handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
  ): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };
