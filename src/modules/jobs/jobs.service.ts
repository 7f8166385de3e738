import { createHash, randomUUID } from "crypto";
import { AppError } from "../../middleware/errors";
import { errorMessage, logError, logInfo, logWarn } from "../../observability/logger";
import { type ArtifactStore, type OutputKind, isOutputKind, ArtifactNotFoundError } from "../artifacts/artifacts.store";
import { type JobDispatcher } from "../dispatcher/dispatcher";
import { type OcrEngine } from "../pipeline/pipeline.types";
import { JobInProgressError, JobNotFoundError } from "./jobs.errors";
import { type JobStore } from "./jobs.repo";
import { type Job, type JobStatus } from "./jobs.types";

const DAY_MS = 24 * 60 * 60 * 1000;

export const INTERRUPTED_MESSAGE = "Interrupted by service restart";

export type ResultReadiness =
  | { state: "not_ready"; job: Job }
  | { state: "failed"; job: Job; errorMessage: string };

export type JobResult = ResultReadiness | { state: "ready"; job: Job; kind: OutputKind; content: Buffer };

export type JobImages = ResultReadiness | { state: "ready"; job: Job; images: string[] };

export type JobImage = ResultReadiness | { state: "ready"; job: Job; name: string; content: Buffer };

export type QueueStatus = {
  queueSize: number;
  activeCount: number;
  queuedJobIds: string[];
  activeJobIds: string[];
};

export type PurgeSummary = {
  purgedJobIds: string[];
  orphanedNamespaces: string[];
};

export type JobServiceDeps = {
  jobs: JobStore;
  artifacts: ArtifactStore;
  dispatcher: JobDispatcher;
  engine: Pick<OcrEngine, "isReady">;
};

export class JobService {
  private readonly jobs: JobStore;
  private readonly artifacts: ArtifactStore;
  private readonly dispatcher: JobDispatcher;
  private readonly engine: Pick<OcrEngine, "isReady">;
  private readonly generateId: () => string;

  constructor(deps: JobServiceDeps, options: { generateId?: () => string } = {}) {
    this.jobs = deps.jobs;
    this.artifacts = deps.artifacts;
    this.dispatcher = deps.dispatcher;
    this.engine = deps.engine;
    this.generateId = options.generateId ?? randomUUID;
  }

  async submitJob(filename: string, document: Buffer): Promise<Job> {
    const name = filename.trim();
    if (!name.toLowerCase().endsWith(".pdf")) {
      throw new AppError("validation_error", "Only PDF files are supported.", 400);
    }
    if (document.length === 0) {
      throw new AppError("validation_error", "Document is empty.", 400);
    }

    const id = this.generateId();
    const fileHash = createHash("sha256").update(document).digest("hex");
    const job = await this.jobs.create(id, name, fileHash);

    try {
      await this.artifacts.allocate(id);
      await this.artifacts.writeInput(id, document);
    } catch (err) {
      const message = `Failed to save file: ${errorMessage(err)}`;
      logError("job_input_save_failed", { jobId: id, error: message });
      await this.rollbackSubmission(id);
      throw new AppError("input_save_failed", message, 500);
    }

    this.dispatcher.submit(id);
    logInfo("job_submitted", { jobId: id, filename: name, bytes: document.length });
    return job;
  }

  async getStatus(id: string): Promise<Job> {
    return this.jobs.get(id);
  }

  async listJobs(status?: JobStatus): Promise<Job[]> {
    return this.jobs.list(status);
  }

  async getResult(id: string, kind: string): Promise<JobResult> {
    const job = await this.jobs.get(id);
    if (!isOutputKind(kind)) {
      throw new ArtifactNotFoundError(id, kind);
    }
    const readiness = this.readiness(job);
    if (readiness) {
      return readiness;
    }
    const content = await this.artifacts.readOutput(id, kind);
    return { state: "ready", job, kind, content };
  }

  async listImages(id: string): Promise<JobImages> {
    const job = await this.jobs.get(id);
    const readiness = this.readiness(job);
    if (readiness) {
      return readiness;
    }
    return { state: "ready", job, images: await this.artifacts.listImages(id) };
  }

  async getImage(id: string, name: string): Promise<JobImage> {
    const job = await this.jobs.get(id);
    const readiness = this.readiness(job);
    if (readiness) {
      return readiness;
    }
    return { state: "ready", job, name, content: await this.artifacts.readImage(id, name) };
  }

  /**
   * Removes the record, then the artifact namespace. If the namespace cannot be
   * removed the record stays deleted and the directory is left for the orphan
   * sweep in `purgeExpiredJobs`.
   */
  async deleteJob(id: string): Promise<void> {
    const job = await this.jobs.get(id);
    if (job.status === "processing" || this.dispatcher.isRunning(id)) {
      throw new JobInProgressError(id);
    }
    const cancelled = this.dispatcher.cancel(id);

    let removed: boolean;
    try {
      removed = await this.jobs.delete(id);
    } catch (err) {
      if (cancelled) {
        this.dispatcher.submit(id);
      }
      throw err;
    }
    if (!removed) {
      throw new JobNotFoundError(id);
    }
    try {
      await this.artifacts.remove(id);
    } catch (err) {
      logError("job_artifacts_remove_failed", { jobId: id, error: errorMessage(err) });
      throw new AppError("artifact_cleanup_failed", "Job deleted but its artifacts could not be removed.", 500);
    }
    logInfo("job_deleted", { jobId: id });
  }

  queueStatus(): QueueStatus {
    const { queuedJobIds, activeJobIds } = this.dispatcher.snapshot();
    return {
      queueSize: queuedJobIds.length,
      activeCount: activeJobIds.length,
      queuedJobIds,
      activeJobIds,
    };
  }

  async health(): Promise<{ status: "healthy"; modelLoaded: boolean }> {
    let modelLoaded = false;
    try {
      modelLoaded = await this.engine.isReady();
    } catch (err) {
      logWarn("ocr_engine_health_failed", { error: errorMessage(err) });
    }
    return { status: "healthy", modelLoaded };
  }

  /**
   * Start-up recovery: `pending` jobs go back on the queue in creation order;
   * jobs a previous process left `processing` are failed.
   */
  async resumeJobs(): Promise<{ resumed: string[]; interrupted: string[] }> {
    const pending = (await this.jobs.list("pending")).reverse();
    const resumed: string[] = [];
    for (const job of pending) {
      if (!this.dispatcher.isTracked(job.id)) {
        this.dispatcher.submit(job.id);
        resumed.push(job.id);
      }
    }

    const interrupted: string[] = [];
    for (const job of await this.jobs.list("processing")) {
      if (this.dispatcher.isRunning(job.id)) {
        continue;
      }
      await this.jobs.update(job.id, { status: "failed", errorMessage: INTERRUPTED_MESSAGE });
      interrupted.push(job.id);
    }

    if (resumed.length > 0 || interrupted.length > 0) {
      logInfo("jobs_resumed", { resumed, interrupted });
    }
    return { resumed, interrupted };
  }

  /** Deletes terminal jobs older than `retentionDays` and any namespace without a record. */
  async purgeExpiredJobs(retentionDays: number, now: Date = new Date()): Promise<PurgeSummary> {
    const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);
    const purgedJobIds: string[] = [];
    for (const job of await this.jobs.listTerminalCreatedBefore(cutoff)) {
      await this.jobs.delete(job.id);
      await this.artifacts.remove(job.id);
      purgedJobIds.push(job.id);
    }

    const orphanedNamespaces: string[] = [];
    for (const id of await this.artifacts.listNamespaces()) {
      if (this.dispatcher.isTracked(id) || (await this.jobs.find(id))) {
        continue;
      }
      await this.artifacts.remove(id);
      orphanedNamespaces.push(id);
    }

    if (purgedJobIds.length > 0 || orphanedNamespaces.length > 0) {
      logInfo("jobs_purged", { purgedJobIds, orphanedNamespaces });
    }
    return { purgedJobIds, orphanedNamespaces };
  }

  private readiness(job: Job): ResultReadiness | null {
    if (job.status === "pending" || job.status === "processing") {
      return { state: "not_ready", job };
    }
    if (job.status === "failed") {
      return { state: "failed", job, errorMessage: job.errorMessage ?? "unknown_error" };
    }
    return null;
  }

  /** The caller never received the id, so the half-created job is removed. */
  private async rollbackSubmission(id: string): Promise<void> {
    try {
      await this.jobs.delete(id);
      await this.artifacts.remove(id);
    } catch (err) {
      logError("job_submission_rollback_failed", { jobId: id, error: errorMessage(err) });
    }
  }
}
