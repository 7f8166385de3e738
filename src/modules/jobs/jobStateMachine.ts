import { InvalidJobTransitionError } from "./jobs.errors";
import { type Job, type JobStatus, type JobUpdate, isTerminalStatus } from "./jobs.types";

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Validates `update` against `current` and returns the merged fields.
 * Every rule of the job lifecycle is checked here and nowhere else.
 */
export function applyJobUpdate(current: Job, update: JobUpdate): Omit<Job, "createdAt" | "updatedAt"> {
  const reject = (reason: string): never => {
    throw new InvalidJobTransitionError(current.id, current.status, reason);
  };

  if (isTerminalStatus(current.status)) {
    reject("terminal jobs cannot be updated");
  }

  if (update.status === current.status) {
    reject(`already ${current.status}`);
  }
  const nextStatus = update.status ?? current.status;
  if (nextStatus !== current.status && !canTransition(current.status, nextStatus)) {
    reject(`cannot move to ${nextStatus}`);
  }

  const touchesProgress = update.totalUnits !== undefined || update.processedUnits !== undefined;
  if (touchesProgress && current.status !== "processing") {
    reject("progress can only change while processing");
  }

  const totalUnits = update.totalUnits ?? current.totalUnits;
  const processedUnits = update.processedUnits ?? current.processedUnits;

  if (!isNonNegativeInteger(totalUnits) || !isNonNegativeInteger(processedUnits)) {
    reject("unit counts must be non-negative integers");
  }
  if (current.totalUnits > 0 && totalUnits !== current.totalUnits) {
    reject("totalUnits is fixed once known");
  }
  if (processedUnits < current.processedUnits) {
    reject("processedUnits cannot decrease");
  }
  if (totalUnits > 0 && processedUnits > totalUnits) {
    reject(`processedUnits ${processedUnits} exceeds totalUnits ${totalUnits}`);
  }

  if (nextStatus === "completed" && processedUnits !== totalUnits) {
    reject(`cannot complete with ${processedUnits}/${totalUnits} units processed`);
  }

  let errorMessage: string | null = null;
  if (nextStatus === "failed") {
    const message = update.errorMessage?.trim();
    if (!message) {
      reject("failed jobs require an error message");
    }
    errorMessage = message ?? null;
  } else if (update.errorMessage !== undefined) {
    reject("errorMessage is only allowed when failing a job");
  }

  return {
    id: current.id,
    status: nextStatus,
    filename: current.filename,
    fileHash: current.fileHash,
    totalUnits,
    processedUnits,
    errorMessage,
  };
}
