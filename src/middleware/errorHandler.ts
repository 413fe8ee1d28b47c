import type { NextFunction, Request, Response } from "express";
import logger from "../logger";
import { CorsRejectedError } from "./cors";

// body-parser errors carry the HTTP status they should produce
const clientErrorStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({ success: false, code: "NOT_FOUND", error: `No route for ${req.method} ${req.path}` });
};

/** Last middleware: every failure leaves as `{ success: false, code, error }`. */
export const jsonErrorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof CorsRejectedError) {
    res.status(403).json({ success: false, code: "CORS_REJECTED", error: "Origin not allowed" });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    logger.warn("Rejected malformed request", { path: req.path, status });
    res.status(status).json({
      success: false,
      code: "INVALID_REQUEST",
      error: status === 413 ? "Request body is too large" : "Request body is not valid JSON",
    });
    return;
  }

  logger.error("Unhandled request error", { error, path: req.path });
  res.status(500).json({ success: false, code: "INTERNAL_ERROR", error: "Internal server error" });
};
