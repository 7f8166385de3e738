import fs from "fs";
import os from "os";
import path from "path";
import { type Pool } from "pg";
import { ArtifactStore, type ArtifactFs } from "../../modules/artifacts/artifacts.store";
import { JobDispatcher } from "../../modules/dispatcher/dispatcher";
import { JobStore } from "../../modules/jobs/jobs.repo";
import { JobService } from "../../modules/jobs/jobs.service";
import { PipelineRunner, type PipelineOptions } from "../../modules/pipeline/pipeline.runner";
import { FakeOcrBackend, type FakeOcrBackendOptions } from "./fakeOcrBackend";
import { createMemoryPool } from "./memoryDb";

export type Harness = {
  pool: Pool;
  root: string;
  jobs: JobStore;
  artifacts: ArtifactStore;
  backend: FakeOcrBackend;
  runner: PipelineRunner;
  dispatcher: JobDispatcher;
  service: JobService;
  cleanup: () => Promise<void>;
};

export type HarnessOptions = {
  backend?: FakeOcrBackendOptions;
  pipeline?: PipelineOptions;
  concurrency?: number;
  usePreprocessor?: boolean;
  fs?: ArtifactFs;
  now?: () => Date;
  generateId?: () => string;
};

export function makeTempRoot(prefix = "pdf-ocr-jobs-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export const SAMPLE_PDF = Buffer.from("%PDF-1.4 sample");

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const pool = await createMemoryPool();
  const root = makeTempRoot();
  const jobs = new JobStore(pool, { now: options.now });
  const artifacts = new ArtifactStore(root, { fs: options.fs });
  const backend = new FakeOcrBackend(options.backend);
  const runner = new PipelineRunner(
    {
      jobs,
      artifacts,
      rasterizer: backend,
      engine: backend,
      renderer: backend,
      preprocessor: options.usePreprocessor ? backend : undefined,
    },
    options.pipeline
  );
  const dispatcher = new JobDispatcher(runner, { concurrency: options.concurrency ?? 1 });
  const service = new JobService(
    { jobs, artifacts, dispatcher, engine: backend },
    { generateId: options.generateId }
  );

  return {
    pool,
    root,
    jobs,
    artifacts,
    backend,
    runner,
    dispatcher,
    service,
    cleanup: async () => {
      await dispatcher.stop();
      await pool.end();
      fs.rmSync(root, { recursive: true, force: true });
    },
  };
}

export function sequentialIds(prefix = "job"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export async function waitFor(check: () => Promise<boolean>, attempts = 200): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (await check()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error("condition not met in time");
}
