import { Request, Response, NextFunction } from "express";
import { HttpError, NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

// body-parser rejects malformed JSON and oversized bodies with a 4xx error
// carrying `status` and `expose`
const isExposedClientError = (
  err: unknown
): err is { status: number; message: string } =>
  err instanceof Error &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500 &&
  "expose" in err &&
  err.expose === true;

export function notFoundMiddleware(
  _req: Request,
  _res: Response,
  next: NextFunction
) {
  next(new NotFoundError());
}

export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof HttpError) {
    logger.warn(`${req.method} ${req.originalUrl} - ${err.message}`);
    return sendError(res, err.message, err.status);
  }

  if (isExposedClientError(err)) {
    logger.warn(`${req.method} ${req.originalUrl} - ${err.message}`);
    return sendError(res, err.message, err.status);
  }

  logger.error("Unhandled error", err);
  return sendError(res, "Internal Server Error", 500);
}
