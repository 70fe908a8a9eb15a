import { NextFunction, Request, Response } from "express";
import { HttpError, errorMessage } from "../../utils/errors";
import { componentLogger } from "../../utils/logger";
import { sendFailure } from "../http-response";

const log = componentLogger("http");

/* Client errors raised by express.json() (malformed JSON, oversized body) carry a 4xx status. */
function clientErrorStatus(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * Fallthrough for routes that matched nothing.
 */
export const notFoundHandler = (req: Request, res: Response) => {
  sendFailure(res, 404, `Route ${req.method} ${req.path} not found`);
};

/**
 * Final error handler. Renders HttpError with its status, body-parser client
 * errors as 400, and anything else as 500 without leaking details.
 */
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof HttpError) {
    log.warn("Request rejected", {
      method: req.method,
      path: req.path,
      status: error.status,
      error: error.message,
    });
    return sendFailure(res, error.status, error.message);
  }

  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== undefined) {
    log.warn("Malformed request", {
      method: req.method,
      path: req.path,
      status: clientStatus,
      error: errorMessage(error),
    });
    return sendFailure(res, 400, "Malformed request body");
  }

  log.error("Unhandled error", {
    method: req.method,
    path: req.path,
    error: errorMessage(error),
  });
  return sendFailure(res, 500, "An unexpected error occurred.");
};
