export const JOB_STATUSES = ["pending", "processing", "completed", "failed"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["completed", "failed"]);

export type Job = {
  id: string;
  status: JobStatus;
  filename: string;
  fileHash: string | null;
  totalUnits: number;
  processedUnits: number;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type JobUpdate = {
  status?: JobStatus;
  totalUnits?: number;
  processedUnits?: number;
  errorMessage?: string;
};

export type JobRow = {
  id: string;
  status: string;
  filename: string;
  file_hash: string | null;
  total_units: number;
  processed_units: number;
  error_message: string | null;
  created_at: Date | string;
  updated_at: Date | string;
};

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === "string" && JOB_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.has(status);
}
