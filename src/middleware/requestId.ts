import { type NextFunction, type Request, type Response } from "express";
import { randomUUID } from "crypto";
import { runWithRequestContext } from "./requestContext";

const MAX_REQUEST_ID_LENGTH = 128;

export function requestId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.get("x-request-id");
  const trimmedHeader = headerId ? headerId.trim() : "";
  const id =
    trimmedHeader.length > 0 && trimmedHeader.length <= MAX_REQUEST_ID_LENGTH
      ? trimmedHeader
      : randomUUID();

  res.locals.requestId = id;
  res.locals.requestStart = Date.now();
  res.setHeader("x-request-id", id);
  runWithRequestContext({ requestId: id, route: req.originalUrl }, () => {
    next();
  });
}
