import { type NextFunction, type Request, type Response } from "express";
import { timingSafeEqual } from "crypto";
import { logWarn } from "../observability/logger";

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function rejectUnauthorized(res: Response, code: string, message: string): void {
  res.setHeader("WWW-Authenticate", "Bearer");
  res.status(401).json({
    code,
    message,
    requestId: res.locals.requestId ?? "unknown",
  });
}

/**
 * Static bearer-token guard. With no configured token every request passes.
 */
export function requireBearerToken(expectedToken: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      next();
      return;
    }
    const header = req.get("authorization");
    const match = header ? /^Bearer\s+(.+)$/i.exec(header.trim()) : null;
    if (!match) {
      rejectUnauthorized(res, "missing_token", "Bearer token required.");
      return;
    }
    if (!tokensMatch(match[1], expectedToken)) {
      logWarn("auth_token_rejected", { route: req.originalUrl });
      rejectUnauthorized(res, "invalid_token", "Invalid authentication token.");
      return;
    }
    next();
  };
}
