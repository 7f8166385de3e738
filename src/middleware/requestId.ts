import { type NextFunction, type Request, type Response } from "express";
import { randomUUID } from "crypto";
import { runWithRequestContext } from "../observability/requestContext";

const MAX_REQUEST_ID_LENGTH = 128;

export function requestId(req: Request, res: Response, next: NextFunction): void {
  const header = req.get("x-request-id")?.trim() ?? "";
  const id = header.length > 0 && header.length <= MAX_REQUEST_ID_LENGTH ? header : randomUUID();
  const start = Date.now();
  res.locals.requestId = id;
  res.locals.requestStart = start;
  res.setHeader("x-request-id", id);
  runWithRequestContext({ requestId: id, route: req.originalUrl, start }, () => {
    next();
  });
}
