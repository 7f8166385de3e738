import dotenv from "dotenv";
import { type Server } from "http";
import {
  assertEnv,
  getArtifactRoot,
  getAuthToken,
  getCorsAllowedOrigins,
  getDocumentMaxSizeBytes,
  getJobRetentionDays,
  getOcrBackendUrl,
  getPort,
  getPreprocessConcurrency,
  getRetentionSweepIntervalMs,
  getSkipIncompletePages,
  getStageTimeoutMs,
  getWorkerConcurrency,
} from "./config";
import { buildApp } from "./app";
import { checkDb, createPool } from "./db";
import { runMigrations } from "./migrations";
import { ArtifactStore } from "./modules/artifacts/artifacts.store";
import { JobDispatcher } from "./modules/dispatcher/dispatcher";
import { JobStore } from "./modules/jobs/jobs.repo";
import { JobService } from "./modules/jobs/jobs.service";
import { startRetentionWorker } from "./modules/jobs/retention.worker";
import { createOcrBackendClient } from "./modules/pipeline/ocrBackend.client";
import { PipelineRunner } from "./modules/pipeline/pipeline.runner";
import { errorMessage, logError, logInfo } from "./observability/logger";
import { installProcessHandlers } from "./observability/processHandlers";

dotenv.config();

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  installProcessHandlers();
  assertEnv();

  const pool = createPool();
  await checkDb(pool);
  await runMigrations(pool);

  const jobs = new JobStore(pool);
  const artifacts = new ArtifactStore(getArtifactRoot());
  const backend = createOcrBackendClient({ baseUrl: getOcrBackendUrl() });
  const runner = new PipelineRunner(
    { jobs, artifacts, rasterizer: backend, preprocessor: backend, engine: backend, renderer: backend },
    {
      stageTimeoutMs: getStageTimeoutMs(),
      preprocessConcurrency: getPreprocessConcurrency(),
      skipIncompletePages: getSkipIncompletePages(),
    }
  );
  const dispatcher = new JobDispatcher(runner, { concurrency: getWorkerConcurrency() });
  const jobService = new JobService({ jobs, artifacts, dispatcher, engine: backend });

  await jobService.resumeJobs();
  const retention = startRetentionWorker(jobService, {
    retentionDays: getJobRetentionDays(),
    intervalMs: getRetentionSweepIntervalMs(),
  });

  const app = buildApp({
    jobService,
    authToken: getAuthToken(),
    maxDocumentBytes: getDocumentMaxSizeBytes(),
    corsAllowedOrigins: getCorsAllowedOrigins(),
  });
  const port = getPort();
  const server = app.listen(port, "0.0.0.0", () => {
    logInfo("server_listening", { port, workerConcurrency: getWorkerConcurrency() });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo("server_shutdown_started", { signal });
    retention.stop();
    try {
      await closeServer(server);
      await dispatcher.stop();
      await pool.end();
      logInfo("server_shutdown_completed", { signal });
    } catch (err) {
      logError("server_shutdown_failed", { signal, error: errorMessage(err) });
      process.exitCode = 1;
    }
  };

  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logError("server_start_failed", { error: errorMessage(err) });
  process.exit(1);
});
