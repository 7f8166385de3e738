import { type NextFunction, type Request, type Response } from "express";
import { logInfo } from "../observability/logger";

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = res.locals.requestId ?? "unknown";

  logInfo("request_started", {
    requestId,
    method: req.method,
    route: req.originalUrl,
    userAgent: req.get("user-agent"),
    authorization: req.get("authorization") ? "PRESENT" : "MISSING",
  });

  res.on("finish", () => {
    logInfo("request_completed", {
      requestId,
      method: req.method,
      route: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start,
      outcome: res.statusCode >= 400 ? "failure" : "success",
    });
  });

  next();
}
