import type { Application, Express, NextFunction, Request, Response } from "express";
import { allowedMethodsFor } from "../debug/printRoutes";
import { logError, logWarn } from "../observability/logger";

export class AppError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "AppError";
    this.status = status;
  }
}

export type ErrorBody = {
  detail: string;
};

export const NOT_FOUND_BODY: ErrorBody = Object.freeze({ detail: "Not Found" });
export const METHOD_NOT_ALLOWED_BODY: ErrorBody = Object.freeze({ detail: "Method Not Allowed" });
export const INTERNAL_ERROR_BODY: ErrorBody = Object.freeze({ detail: "Internal Server Error" });

function durationSince(res: Response): number {
  const start = Number(res.locals.requestStart);
  return Number.isFinite(start) ? Date.now() - start : 0;
}

/**
 * Answers requests for a known path with a method it does not serve.
 * Requests for unknown paths fall through to the 404 handler.
 */
export function methodNotAllowedHandler(app: Express | Application) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const allowed = allowedMethodsFor(app, req.path);
    if (allowed.length === 0 || allowed.includes(req.method)) {
      next();
      return;
    }
    res.set("Allow", allowed.join(", "));
    res.status(405).json(METHOD_NOT_ALLOWED_BODY);
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json(NOT_FOUND_BODY);
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const logBase = {
    requestId: res.locals.requestId ?? "unknown",
    method: req.method,
    route: req.originalUrl,
    durationMs: durationSince(res),
  };

  if (err instanceof AppError) {
    const status = err.status >= 400 && err.status <= 599 ? err.status : 500;
    const log = status >= 500 ? logError : logWarn;
    log("request_error", { ...logBase, status, message: err.message });
    res.status(status).json({ detail: err.message });
    return;
  }

  logError("request_error", {
    ...logBase,
    status: 500,
    message: err instanceof Error ? err.message : String(err),
    err,
  });
  res.status(500).json(INTERNAL_ERROR_BODY);
}
