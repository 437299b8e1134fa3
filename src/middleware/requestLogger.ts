import { type NextFunction, type Request, type Response } from "express";
import { logInfo } from "../observability/logger";

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = res.locals.requestId ?? "unknown";
  const ip = req.ip ?? "unknown";

  logInfo("request_started", {
    requestId,
    method: req.method,
    route: req.originalUrl,
    userAgent: req.get("user-agent"),
    ip,
  });

  res.on("finish", () => {
    const durationMs = Date.now() - start;

    logInfo("request_completed", {
      requestId,
      route: req.originalUrl,
      method: req.method,
      status: res.statusCode,
      ip,
      durationMs,
      outcome: res.statusCode >= 400 ? "failure" : "success",
    });
  });

  next();
}
