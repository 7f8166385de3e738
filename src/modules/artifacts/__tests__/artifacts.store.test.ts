import fs, { promises as nodeFs } from "fs";
import path from "path";
import { makeTempRoot } from "../../../__tests__/helpers/harness";
import {
  ArtifactExistsError,
  ArtifactNotFoundError,
  ArtifactStore,
  type ArtifactFs,
  type JobOutputs,
} from "../artifacts.store";

function outputs(overrides: Partial<JobOutputs> = {}): JobOutputs {
  return {
    primaryText: "# Title\n",
    annotatedText: "<|ref|>title<|/ref|><|det|>[[0, 0, 10, 10]]<|/det|># Title\n",
    layoutDocument: Buffer.from("%PDF-layout"),
    images: new Map([
      ["0_1.jpg", Buffer.from("second")],
      ["0_0.jpg", Buffer.from("first")],
    ]),
    ...overrides,
  };
}

describe("ArtifactStore", () => {
  let root: string;
  let store: ArtifactStore;

  beforeEach(() => {
    root = makeTempRoot();
    store = new ArtifactStore(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("allocates a namespace once", async () => {
    const handle = await store.allocate("job-1");

    expect(handle).toEqual({ id: "job-1", dir: path.join(root, "job-1") });
    expect(fs.existsSync(path.join(root, "job-1"))).toBe(true);
    await expect(store.allocate("job-1")).rejects.toBeInstanceOf(ArtifactExistsError);
  });

  it("stores the input document write-once", async () => {
    await store.allocate("job-1");
    await store.writeInput("job-1", Buffer.from("%PDF-1"));

    expect((await store.readInput("job-1")).toString()).toBe("%PDF-1");
    await expect(store.writeInput("job-1", Buffer.from("%PDF-2"))).rejects.toBeInstanceOf(ArtifactExistsError);
    expect((await store.readInput("job-1")).toString()).toBe("%PDF-1");
  });

  it("refuses writes outside an allocated namespace", async () => {
    await expect(store.writeInput("job-1", Buffer.from("x"))).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(store.readInput("job-1")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("rejects ids that would escape the root", async () => {
    await expect(store.allocate("../escape")).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(store.readImage("job-1", "../input.pdf")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("writes page images and per-page results", async () => {
    await store.allocate("job-1");
    await store.writePageImages("job-1", [Buffer.from("p1"), Buffer.from("p2")]);
    await store.writePageResult("job-1", 1, "page two text");

    const pagesDir = path.join(root, "job-1", "pages");
    expect(fs.readdirSync(pagesDir).sort()).toEqual(["0001.png", "0002.png", "0002.txt"]);
    expect(fs.readFileSync(path.join(pagesDir, "0002.txt"), "utf8")).toBe("page two text");
  });

  it("publishes every output together", async () => {
    await store.allocate("job-1");
    await store.writeOutputs("job-1", outputs());

    expect((await store.readOutput("job-1", "markdown")).toString()).toBe("# Title\n");
    expect((await store.readOutput("job-1", "markdown_det")).toString()).toBe(
      "<|ref|>title<|/ref|><|det|>[[0, 0, 10, 10]]<|/det|># Title\n"
    );
    expect((await store.readOutput("job-1", "layout_pdf")).toString()).toBe("%PDF-layout");
    expect(await store.listImages("job-1")).toEqual(["0_0.jpg", "0_1.jpg"]);
    expect((await store.readImage("job-1", "0_1.jpg")).toString()).toBe("second");
    expect(fs.readdirSync(path.join(root, "job-1"))).toEqual(["outputs"]);
  });

  it("publishes outputs only once", async () => {
    await store.allocate("job-1");
    await store.writeOutputs("job-1", outputs());

    await expect(store.writeOutputs("job-1", outputs({ primaryText: "other" }))).rejects.toBeInstanceOf(
      ArtifactExistsError
    );
    expect((await store.readOutput("job-1", "markdown")).toString()).toBe("# Title\n");
  });

  it("reports missing outputs before publication", async () => {
    await store.allocate("job-1");

    await expect(store.readOutput("job-1", "markdown")).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(store.readOutput("job-1", "transcript")).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(store.listImages("job-1")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("leaves nothing visible when publication fails midway", async () => {
    const failingFs: ArtifactFs = {
      ...nodeFs,
      writeFile: async (...args: Parameters<typeof nodeFs.writeFile>) => {
        if (String(args[0]).endsWith("output_layouts.pdf")) {
          throw new Error("disk full");
        }
        return nodeFs.writeFile(...args);
      },
    };
    const flaky = new ArtifactStore(root, { fs: failingFs });
    await flaky.allocate("job-1");

    await expect(flaky.writeOutputs("job-1", outputs())).rejects.toThrow("disk full");
    expect(fs.readdirSync(path.join(root, "job-1"))).toEqual([]);
    await expect(flaky.readOutput("job-1", "markdown")).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("removes namespaces idempotently and lists the rest", async () => {
    await store.allocate("job-1");
    await store.allocate("job-2");
    await store.writeInput("job-1", Buffer.from("%PDF"));

    await store.remove("job-1");
    await store.remove("job-1");

    expect(fs.existsSync(path.join(root, "job-1"))).toBe(false);
    expect(await store.listNamespaces()).toEqual(["job-2"]);
  });

  it("lists no namespaces before the root exists", async () => {
    const fresh = new ArtifactStore(path.join(root, "not-yet"));
    expect(await fresh.listNamespaces()).toEqual([]);
  });
});
