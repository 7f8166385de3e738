import { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { logError, logWarn } from "../observability/logger";

export class AppError extends Error {
  status: number;
  code: string;

  constructor(code: string, message: string, status = 400) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
  }
}

const MULTER_STATUS: Partial<Record<multer.ErrorCode, number>> = {
  LIMIT_FILE_SIZE: 413,
  LIMIT_UNEXPECTED_FILE: 400,
};

function isBodyParserError(err: Error): err is Error & { status: number; type: string } {
  return "status" in err && typeof err.status === "number" && "type" in err && typeof err.type === "string";
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    code: "not_found",
    message: "Not found",
    requestId: res.locals.requestId ?? "unknown",
  });
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = res.locals.requestId ?? "unknown";
  const logBase = {
    requestId,
    method: req.method,
    route: req.originalUrl,
  };

  if (err instanceof AppError) {
    const log = err.status >= 500 ? logError : logWarn;
    log("request_error", {
      ...logBase,
      status: err.status,
      code: err.code,
      message: err.message,
    });
    res.status(err.status).json({
      code: err.code,
      message: err.message,
      requestId,
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    const status = MULTER_STATUS[err.code] ?? 400;
    logWarn("request_error", { ...logBase, status, code: err.code });
    res.status(status).json({
      code: status === 413 ? "payload_too_large" : "validation_error",
      message: err.message,
      requestId,
    });
    return;
  }

  if (isBodyParserError(err) && err.status < 500) {
    logWarn("request_error", { ...logBase, status: err.status, code: err.type });
    res.status(err.status).json({
      code: err.status === 413 ? "payload_too_large" : "invalid_body",
      message: err.message,
      requestId,
    });
    return;
  }

  logError("request_error", {
    ...logBase,
    status: 500,
    code: "internal_error",
    message: err.message,
    stack: err.stack,
  });
  res.status(500).json({
    code: "internal_error",
    message: "Unexpected error",
    requestId,
  });
}
