import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Forwards rejected promises from async handlers to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
