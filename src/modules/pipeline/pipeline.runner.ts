import { type ArtifactStore, type JobOutputs } from "../artifacts/artifacts.store";
import { type JobStore } from "../jobs/jobs.repo";
import { errorMessage, logError, logInfo, logWarn } from "../../observability/logger";
import { mapWithConcurrency } from "../../utils/concurrency";
import { withTimeout } from "../../utils/withTimeout";
import { PAGE_SEPARATOR, imageName, toPrimaryText } from "./markup";
import {
  type InferenceResult,
  type LayoutRenderer,
  type OcrEngine,
  type PageImage,
  type PagePreprocessor,
  type PipelineStage,
  type Rasterizer,
  StageFailureError,
} from "./pipeline.types";

const MAX_ERROR_MESSAGE_LENGTH = 2000;

export type PipelineDeps = {
  jobs: JobStore;
  artifacts: ArtifactStore;
  rasterizer: Rasterizer;
  engine: OcrEngine;
  renderer: LayoutRenderer;
  preprocessor?: PagePreprocessor;
};

export type PipelineOptions = {
  /** Deadline for each external call; 0 disables it. */
  stageTimeoutMs?: number;
  preprocessConcurrency?: number;
  /** Count pages whose output is incomplete but leave them out of the results. */
  skipIncompletePages?: boolean;
};

type PageOutcome = {
  index: number;
  image: PageImage;
  result: InferenceResult;
};

/**
 * Drives one job from `pending` to a terminal state. Once a job is claimed,
 * `run` always settles it as `completed` or `failed` and never rejects.
 */
export class PipelineRunner {
  private readonly deps: PipelineDeps;
  private readonly stageTimeoutMs: number;
  private readonly preprocessConcurrency: number;
  private readonly skipIncompletePages: boolean;

  constructor(deps: PipelineDeps, options: PipelineOptions = {}) {
    this.deps = deps;
    this.stageTimeoutMs = options.stageTimeoutMs ?? 0;
    this.preprocessConcurrency = options.preprocessConcurrency ?? 4;
    this.skipIncompletePages = options.skipIncompletePages ?? false;
  }

  async run(jobId: string): Promise<void> {
    if (!(await this.claim(jobId))) {
      return;
    }
    const startedAt = Date.now();
    logInfo("job_started", { jobId });
    try {
      await this.execute(jobId);
      logInfo("job_completed", { jobId, durationMs: Date.now() - startedAt });
    } catch (err) {
      await this.fail(jobId, err, Date.now() - startedAt);
    }
  }

  private async claim(jobId: string): Promise<boolean> {
    try {
      await this.deps.jobs.update(jobId, { status: "processing" });
      return true;
    } catch (err) {
      logWarn("job_claim_rejected", { jobId, error: errorMessage(err) });
      return false;
    }
  }

  private async execute(jobId: string): Promise<void> {
    const { jobs, artifacts } = this.deps;

    const input = await this.local("read_input", () => artifacts.readInput(jobId));

    const pages = await this.external("rasterize", (signal) =>
      this.deps.rasterizer.rasterize(input, { signal })
    );
    if (pages.length === 0) {
      throw new StageFailureError("rasterize", new Error("document has no pages"));
    }
    await jobs.update(jobId, { totalUnits: pages.length });
    await this.local("rasterize", () => artifacts.writePageImages(jobId, pages.map((page) => page.data)));
    logInfo("job_rasterized", { jobId, totalUnits: pages.length });

    const prepared = await this.preprocess(pages);

    const kept: PageOutcome[] = [];
    for (const [index, page] of prepared.entries()) {
      const result = await this.external("infer", (signal) => this.deps.engine.infer(page, { signal }));
      await artifacts.writePageResult(jobId, index, result.text);
      if (!result.complete && this.skipIncompletePages) {
        logWarn("job_page_skipped", { jobId, page: index + 1, reason: "incomplete_output" });
      } else {
        kept.push({ index, image: pages[index], result });
      }
      await jobs.update(jobId, { processedUnits: index + 1 });
    }

    const outputs = await this.assemble(kept);
    await this.local("publish", () => artifacts.writeOutputs(jobId, outputs));
    await jobs.update(jobId, { status: "completed" });
  }

  private async preprocess(pages: PageImage[]): Promise<PageImage[]> {
    const { preprocessor } = this.deps;
    if (!preprocessor) {
      return pages;
    }
    return mapWithConcurrency(pages, this.preprocessConcurrency, (page) =>
      this.external("preprocess", (signal) => preprocessor.preprocess(page, { signal }))
    );
  }

  private async assemble(pages: PageOutcome[]): Promise<JobOutputs> {
    const { renderer } = this.deps;
    let annotatedText = "";
    let primaryText = "";
    const images = new Map<string, Buffer>();
    const rendered: PageImage[] = [];

    for (const page of pages) {
      annotatedText += page.result.text + PAGE_SEPARATOR;
      primaryText += toPrimaryText(page.result.text, page.index) + PAGE_SEPARATOR;

      let imageIndex = 0;
      for (const box of page.result.boxes) {
        if (box.label !== "image") {
          continue;
        }
        const crop = await this.external("render", (signal) => renderer.cropRegion(page.image, box, { signal }));
        images.set(imageName(page.index, imageIndex), crop);
        imageIndex += 1;
      }

      rendered.push(
        await this.external("render", (signal) => renderer.renderLayout(page.image, page.result.boxes, { signal }))
      );
    }

    const layoutDocument = await this.external("render", (signal) =>
      renderer.composeDocument(rendered, { signal })
    );
    return { primaryText, annotatedText, layoutDocument, images };
  }

  private async external<T>(stage: PipelineStage, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call, this.stageTimeoutMs, stage);
    } catch (err) {
      throw err instanceof StageFailureError ? err : new StageFailureError(stage, err);
    }
  }

  private async local<T>(stage: PipelineStage, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw err instanceof StageFailureError ? err : new StageFailureError(stage, err);
    }
  }

  private async fail(jobId: string, err: unknown, durationMs: number): Promise<void> {
    const message = (errorMessage(err) || "unknown_error").slice(0, MAX_ERROR_MESSAGE_LENGTH);
    logError("job_failed", {
      jobId,
      durationMs,
      stage: err instanceof StageFailureError ? err.stage : undefined,
      error: message,
    });
    try {
      await this.deps.jobs.update(jobId, { status: "failed", errorMessage: message });
    } catch (updateErr) {
      logError("job_failure_not_recorded", { jobId, error: errorMessage(updateErr) });
    }
  }
}
