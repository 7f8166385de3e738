import { getRequestId, getRequestRoute } from "./requestContext";

type LogLevel = "info" | "warn" | "error";

export type LogFields = {
  requestId?: string;
  route?: string;
  jobId?: string;
  durationMs?: number | null;
  [key: string]: unknown;
};

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  const requestId = fields.requestId ?? getRequestId();
  const route = fields.route ?? getRequestRoute();
  const { requestId: _req, route: _route, ...rest } = fields;

  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...(requestId ? { requestId } : {}),
    ...(route ? { route } : {}),
    ...rest,
  };
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (process.env.NODE_ENV === "test" && process.env.TEST_LOGGING !== "true") {
    return;
  }
  let output: string;
  try {
    output = JSON.stringify(buildPayload(level, event, fields));
  } catch {
    output = JSON.stringify({ timestamp: new Date().toISOString(), level, event, unserializable: true });
  }
  if (level === "error") {
    process.stderr.write(`${output}\n`);
    return;
  }
  process.stdout.write(`${output}\n`);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown_error";
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}
