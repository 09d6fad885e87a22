/**
 * Async Handler
 * =============
 * Express 4 does not forward rejected promises from route handlers; this
 * wrapper hands them to `next` so they reach `errorHandler`.
 */

import type { NextFunction, Request, Response } from "express";

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res, next).catch(next);
  };
}
