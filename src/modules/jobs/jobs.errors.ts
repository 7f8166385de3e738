import { AppError } from "../../middleware/errors";
import { type JobStatus } from "./jobs.types";

export class JobNotFoundError extends AppError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("job_not_found", "Job not found.", 404);
    this.name = "JobNotFoundError";
    this.jobId = jobId;
  }
}

export class DuplicateJobError extends AppError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("duplicate_job", `Job ${jobId} already exists.`, 409);
    this.name = "DuplicateJobError";
    this.jobId = jobId;
  }
}

export class InvalidJobTransitionError extends AppError {
  readonly jobId: string;
  readonly from: JobStatus;

  constructor(jobId: string, from: JobStatus, reason: string) {
    super("invalid_transition", `Job ${jobId} (${from}): ${reason}`, 409);
    this.name = "InvalidJobTransitionError";
    this.jobId = jobId;
    this.from = from;
  }
}

export class JobInProgressError extends AppError {
  constructor(jobId: string) {
    super("job_in_progress", `Job ${jobId} is processing and cannot be deleted.`, 409);
    this.name = "JobInProgressError";
  }
}
