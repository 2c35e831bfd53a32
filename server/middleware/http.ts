import type { NextFunction, Request, RequestHandler, Response } from "express";
import { MethodNotAllowedError, UnsupportedMediaTypeError } from "../errors";
import logger from "../logger";

/** Media type of the request without parameters such as charset. */
export function mediaTypeOf(header: string | undefined): string | undefined {
  const mediaType = header?.split(";")[0]?.trim().toLowerCase();
  return mediaType ? mediaType : undefined;
}

export function requireContentType(expected: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const received = req.get("content-type");
    if (mediaTypeOf(received) !== expected) {
      return next(new UnsupportedMediaTypeError(expected, received));
    }
    next();
  };
}

/** Terminal handler for a path that exists but not under this method. */
export function methodNotAllowed(allowed: string[]): RequestHandler {
  const allowHeader = allowed.join(", ");
  return (req: Request, res: Response, next: NextFunction) => {
    logger.warn({ method: req.method, path: req.path }, "Method not allowed");
    res.setHeader("Allow", allowHeader);
    next(new MethodNotAllowedError(req.method, allowed));
  };
}
