import fs, { promises as nodeFs } from "fs";
import path from "path";
import { createHarness, SAMPLE_PDF, type Harness, type HarnessOptions } from "../../../__tests__/helpers/harness";
import { END_OF_SEQUENCE } from "../ocrBackend.client";
import { PAGE_SEPARATOR } from "../markup";
import { ArtifactNotFoundError, type ArtifactFs } from "../../artifacts/artifacts.store";

const PAGE_ONE = `Intro<|ref|>image<|/ref|><|det|>[[1, 2, 3, 4]]<|/det|>\nEnd`;
const PAGE_TWO = "a \\coloneqq b";

describe("PipelineRunner", () => {
  let harness: Harness | undefined;

  async function setup(options: HarnessOptions = {}): Promise<Harness> {
    harness = await createHarness(options);
    return harness;
  }

  async function seedJob(h: Harness, id = "job-1"): Promise<void> {
    await h.jobs.create(id, "doc.pdf");
    await h.artifacts.allocate(id);
    await h.artifacts.writeInput(id, SAMPLE_PDF);
  }

  afterEach(async () => {
    await harness?.cleanup();
    harness = undefined;
  });

  it("processes every page and publishes all outputs", async () => {
    const h = await setup({
      backend: { pageTexts: [PAGE_ONE + END_OF_SEQUENCE, PAGE_TWO + END_OF_SEQUENCE] },
    });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.status).toBe("completed");
    expect(job.totalUnits).toBe(2);
    expect(job.processedUnits).toBe(2);
    expect(job.errorMessage).toBeNull();

    expect((await h.artifacts.readOutput("job-1", "markdown")).toString()).toBe(
      `Intro![](images/0_0.jpg)\n\nEnd${PAGE_SEPARATOR}a := b${PAGE_SEPARATOR}`
    );
    expect((await h.artifacts.readOutput("job-1", "markdown_det")).toString()).toBe(
      `${PAGE_ONE}${PAGE_SEPARATOR}${PAGE_TWO}${PAGE_SEPARATOR}`
    );
    expect((await h.artifacts.readOutput("job-1", "layout_pdf")).toString()).toBe("layout:page-1|layout:page-2");
    expect(await h.artifacts.listImages("job-1")).toEqual(["0_0.jpg"]);
    expect((await h.artifacts.readImage("job-1", "0_0.jpg")).toString()).toBe("crop:0:1,2");

    const pagesDir = path.join(h.root, "job-1", "pages");
    expect(fs.readdirSync(pagesDir).sort()).toEqual(["0001.png", "0001.txt", "0002.png", "0002.txt"]);
  });

  it("runs pages through the preprocessor when one is configured", async () => {
    const h = await setup({ backend: { pageCount: 3 }, usePreprocessor: true, pipeline: { preprocessConcurrency: 2 } });
    await seedJob(h);

    await h.runner.run("job-1");

    expect((await h.jobs.get("job-1")).status).toBe("completed");
    expect(h.backend.calls.filter((call) => call === "preprocess")).toHaveLength(3);
    expect((await h.artifacts.readOutput("job-1", "markdown_det")).toString()).toBe(
      `page 1${PAGE_SEPARATOR}page 2${PAGE_SEPARATOR}page 3${PAGE_SEPARATOR}`
    );
  });

  it("fails the job when rasterization fails", async () => {
    const h = await setup({ backend: { failures: { rasterize: new Error("not a pdf") } } });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.status).toBe("failed");
    expect(job.errorMessage).toBe("rasterize failed: not a pdf");
    expect(job.totalUnits).toBe(0);
  });

  it("fails a document without pages", async () => {
    const h = await setup({ backend: { pageTexts: [] } });
    await seedJob(h);

    await h.runner.run("job-1");

    expect((await h.jobs.get("job-1")).errorMessage).toBe("rasterize failed: document has no pages");
  });

  it("keeps progress from pages finished before an inference failure", async () => {
    const h = await setup({
      backend: { pageCount: 3, inferenceFailures: new Map([[1, new Error("model crashed")]]) },
    });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.status).toBe("failed");
    expect(job.errorMessage).toBe("infer failed: model crashed");
    expect(job.totalUnits).toBe(3);
    expect(job.processedUnits).toBe(1);
    await expect(h.artifacts.readOutput("job-1", "markdown")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("fails a stalled inference call after the stage timeout", async () => {
    const h = await setup({ backend: { hangInference: true }, pipeline: { stageTimeoutMs: 20 } });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.status).toBe("failed");
    expect(job.errorMessage).toBe("infer failed: infer timed out after 20ms");
    expect(job.processedUnits).toBe(0);
  });

  it("fails the job when preprocessing fails", async () => {
    const h = await setup({ backend: { failures: { preprocess: new Error("deskew failed") } }, usePreprocessor: true });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.errorMessage).toBe("preprocess failed: deskew failed");
    expect(job.totalUnits).toBe(1);
    expect(job.processedUnits).toBe(0);
  });

  it("fails the job when rendering fails", async () => {
    const h = await setup({ backend: { failures: { composeDocument: new Error("render broke") } } });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.errorMessage).toBe("render failed: render broke");
    expect(job.processedUnits).toBe(1);
  });

  it("fails the job and leaves no outputs when publishing fails", async () => {
    const failingFs: ArtifactFs = {
      ...nodeFs,
      rename: async () => {
        throw new Error("disk full");
      },
    };
    const h = await setup({ fs: failingFs });
    await seedJob(h);

    await h.runner.run("job-1");

    expect((await h.jobs.get("job-1")).errorMessage).toBe("publish failed: disk full");
    expect(fs.readdirSync(path.join(h.root, "job-1")).sort()).toEqual(["input.pdf", "pages"]);
  });

  it("fails the job when its input is missing", async () => {
    const h = await setup();
    await h.jobs.create("job-1", "doc.pdf");

    await h.runner.run("job-1");

    expect((await h.jobs.get("job-1")).errorMessage).toBe(
      "read_input failed: Artifact input.pdf not found for job job-1."
    );
  });

  it("leaves incomplete pages out of the outputs when configured to", async () => {
    const h = await setup({
      backend: { pageTexts: [`kept${END_OF_SEQUENCE}`, "truncated"] },
      pipeline: { skipIncompletePages: true },
    });
    await seedJob(h);

    await h.runner.run("job-1");

    const job = await h.jobs.get("job-1");
    expect(job.status).toBe("completed");
    expect(job.processedUnits).toBe(2);
    expect((await h.artifacts.readOutput("job-1", "markdown")).toString()).toBe(`kept${PAGE_SEPARATOR}`);
    expect((await h.artifacts.readOutput("job-1", "layout_pdf")).toString()).toBe("layout:page-1");
  });

  it("keeps incomplete pages by default", async () => {
    const h = await setup({ backend: { pageTexts: [`kept${END_OF_SEQUENCE}`, "truncated"] } });
    await seedJob(h);

    await h.runner.run("job-1");

    expect((await h.artifacts.readOutput("job-1", "markdown")).toString()).toBe(
      `kept${PAGE_SEPARATOR}truncated${PAGE_SEPARATOR}`
    );
  });

  it("executes a job once when two runs race for it", async () => {
    const h = await setup();
    await seedJob(h);

    await Promise.all([h.runner.run("job-1"), h.runner.run("job-1")]);

    expect(h.backend.calls.filter((call) => call === "rasterize")).toHaveLength(1);
    expect((await h.jobs.get("job-1")).status).toBe("completed");
  });

  it("does nothing for a job it cannot claim", async () => {
    const h = await setup();
    await seedJob(h);
    await h.jobs.update("job-1", { status: "processing" });

    await h.runner.run("job-1");
    await h.runner.run("missing");

    expect(h.backend.calls).toEqual([]);
    expect((await h.jobs.get("job-1")).status).toBe("processing");
  });
});
