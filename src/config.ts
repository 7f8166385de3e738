import { MAX_TIMEOUT_MS } from "./utils/withTimeout";

const requiredEnv = ["DATABASE_URL", "OCR_BACKEND_URL"] as const;

export function assertEnv(): void {
  const missing = requiredEnv.filter((key) => !process.env[key]);
  if (missing.length > 0) {
    throw new Error(`missing_env:${missing.join(",")}`);
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return fallback;
  }
  return parsed;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isInteger(parsed) || parsed < 0) {
    return fallback;
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

export function getPort(): number {
  return parsePositiveInt(process.env.PORT, 8000);
}

export function getDatabaseUrl(): string {
  const value = process.env.DATABASE_URL;
  if (!value) {
    throw new Error("missing_env:DATABASE_URL");
  }
  return value;
}

export function getOcrBackendUrl(): string {
  const value = process.env.OCR_BACKEND_URL;
  if (!value) {
    throw new Error("missing_env:OCR_BACKEND_URL");
  }
  return value.replace(/\/+$/, "");
}

export function getArtifactRoot(): string {
  return process.env.ARTIFACT_ROOT?.trim() || "tmp/pdf_ocr";
}

export function getWorkerConcurrency(): number {
  return parsePositiveInt(process.env.WORKER_CONCURRENCY, 1);
}

export function getPreprocessConcurrency(): number {
  return parsePositiveInt(process.env.PREPROCESS_CONCURRENCY, 4);
}

/** 0 disables the per-call stall guard. */
export function getStageTimeoutMs(): number {
  return Math.min(parseNonNegativeInt(process.env.STAGE_TIMEOUT_MS, 0), MAX_TIMEOUT_MS);
}

export function getSkipIncompletePages(): boolean {
  return parseBoolean(process.env.SKIP_INCOMPLETE_PAGES, false);
}

export function getAuthToken(): string | undefined {
  const value = process.env.AUTH_TOKEN?.trim();
  return value ? value : undefined;
}

export function getDocumentMaxSizeBytes(): number {
  return parsePositiveInt(process.env.DOCUMENT_MAX_SIZE_BYTES, 100 * 1024 * 1024);
}

export function getJobRetentionDays(): number {
  return parsePositiveInt(process.env.JOB_RETENTION_DAYS, 7);
}

export function getRetentionSweepIntervalMs(): number {
  return parsePositiveInt(process.env.RETENTION_SWEEP_INTERVAL_MS, 60 * 60 * 1000);
}

export function getCorsAllowedOrigins(): string[] {
  return (process.env.CORS_ALLOWED_ORIGINS ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
