import { promises as nodeFs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { AppError } from "../../middleware/errors";
import { errorMessage, logWarn } from "../../observability/logger";
import { KeyedLock } from "../../utils/keyedLock";

export const OUTPUT_FILES = {
  markdown: "output.mmd",
  markdown_det: "output_det.mmd",
  layout_pdf: "output_layouts.pdf",
} as const;

export type OutputKind = keyof typeof OUTPUT_FILES;

export type JobOutputs = {
  primaryText: string;
  annotatedText: string;
  layoutDocument: Buffer;
  images: ReadonlyMap<string, Buffer>;
};

export type ArtifactHandle = {
  id: string;
  dir: string;
};

export type ArtifactFs = Pick<
  typeof nodeFs,
  "mkdir" | "writeFile" | "readFile" | "readdir" | "rename" | "rm" | "stat"
>;

const INPUT_FILE = "input.pdf";
const PAGES_DIR = "pages";
const OUTPUTS_DIR = "outputs";
const IMAGES_DIR = "images";
const SAFE_SEGMENT = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export class ArtifactNotFoundError extends AppError {
  constructor(id: string, artifact: string) {
    super("artifact_not_found", `Artifact ${artifact} not found for job ${id}.`, 404);
    this.name = "ArtifactNotFoundError";
  }
}

export class ArtifactExistsError extends AppError {
  constructor(id: string, artifact: string) {
    super("artifact_exists", `Artifact ${artifact} already exists for job ${id}.`, 409);
    this.name = "ArtifactExistsError";
  }
}

export function isOutputKind(value: string): value is OutputKind {
  return Object.prototype.hasOwnProperty.call(OUTPUT_FILES, value);
}

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

function pageFileName(pageIndex: number, extension: string): string {
  return `${String(pageIndex + 1).padStart(4, "0")}.${extension}`;
}

/**
 * Per-job directory tree: `<root>/<id>/input.pdf`, `pages/`, and an `outputs/`
 * directory that only ever appears complete (staged, then renamed into place).
 */
export class ArtifactStore {
  readonly root: string;
  private readonly fs: ArtifactFs;
  private readonly writes = new KeyedLock();

  constructor(root: string, options: { fs?: ArtifactFs } = {}) {
    this.root = path.resolve(root);
    this.fs = options.fs ?? nodeFs;
  }

  async allocate(id: string): Promise<ArtifactHandle> {
    const dir = this.namespacePath(id);
    return this.writes.run(id, async () => {
      await this.fs.mkdir(this.root, { recursive: true });
      try {
        await this.fs.mkdir(dir);
      } catch (err) {
        if (hasErrorCode(err, "EEXIST")) {
          throw new ArtifactExistsError(id, "namespace");
        }
        throw err;
      }
      return { id, dir };
    });
  }

  async writeInput(id: string, bytes: Buffer): Promise<void> {
    const dir = this.namespacePath(id);
    await this.writes.run(id, async () => {
      await this.requireNamespace(id);
      try {
        await this.fs.writeFile(path.join(dir, INPUT_FILE), bytes, { flag: "wx" });
      } catch (err) {
        if (hasErrorCode(err, "EEXIST")) {
          throw new ArtifactExistsError(id, INPUT_FILE);
        }
        throw err;
      }
    });
  }

  async readInput(id: string): Promise<Buffer> {
    return this.readOrNotFound(id, path.join(this.namespacePath(id), INPUT_FILE), INPUT_FILE);
  }

  async writePageImages(id: string, images: readonly Buffer[]): Promise<void> {
    const pagesDir = path.join(this.namespacePath(id), PAGES_DIR);
    await this.writes.run(id, async () => {
      await this.requireNamespace(id);
      await this.fs.mkdir(pagesDir, { recursive: true });
      for (const [index, image] of images.entries()) {
        await this.fs.writeFile(path.join(pagesDir, pageFileName(index, "png")), image, { flag: "wx" });
      }
    });
  }

  /** Raw inference output for one page, written as soon as the page finishes. */
  async writePageResult(id: string, pageIndex: number, text: string): Promise<void> {
    const pagesDir = path.join(this.namespacePath(id), PAGES_DIR);
    await this.writes.run(id, async () => {
      await this.requireNamespace(id);
      await this.fs.mkdir(pagesDir, { recursive: true });
      await this.fs.writeFile(path.join(pagesDir, pageFileName(pageIndex, "txt")), text, "utf8");
    });
  }

  async writeOutputs(id: string, outputs: JobOutputs): Promise<void> {
    const dir = this.namespacePath(id);
    for (const name of outputs.images.keys()) {
      if (!SAFE_SEGMENT.test(name)) {
        throw new AppError("invalid_artifact_name", `Invalid image name: ${name}`, 500);
      }
    }
    await this.writes.run(id, async () => {
      await this.requireNamespace(id);
      const finalDir = path.join(dir, OUTPUTS_DIR);
      if (await this.exists(finalDir)) {
        throw new ArtifactExistsError(id, OUTPUTS_DIR);
      }
      const staging = path.join(dir, `.${OUTPUTS_DIR}-${randomUUID()}`);
      try {
        await this.fs.mkdir(path.join(staging, IMAGES_DIR), { recursive: true });
        await this.fs.writeFile(path.join(staging, OUTPUT_FILES.markdown), outputs.primaryText, "utf8");
        await this.fs.writeFile(path.join(staging, OUTPUT_FILES.markdown_det), outputs.annotatedText, "utf8");
        await this.fs.writeFile(path.join(staging, OUTPUT_FILES.layout_pdf), outputs.layoutDocument);
        for (const [name, bytes] of outputs.images) {
          await this.fs.writeFile(path.join(staging, IMAGES_DIR, name), bytes);
        }
        await this.fs.rename(staging, finalDir);
      } catch (err) {
        await this.fs.rm(staging, { recursive: true, force: true }).catch((cleanupError: unknown) => {
          logWarn("artifact_staging_cleanup_failed", { jobId: id, error: errorMessage(cleanupError) });
        });
        throw err;
      }
    });
  }

  async readOutput(id: string, kind: string): Promise<Buffer> {
    if (!isOutputKind(kind)) {
      throw new ArtifactNotFoundError(id, kind);
    }
    const file = path.join(this.namespacePath(id), OUTPUTS_DIR, OUTPUT_FILES[kind]);
    return this.readOrNotFound(id, file, kind);
  }

  async listImages(id: string): Promise<string[]> {
    const imagesDir = path.join(this.namespacePath(id), OUTPUTS_DIR, IMAGES_DIR);
    try {
      const names = await this.fs.readdir(imagesDir);
      return names.filter((name) => SAFE_SEGMENT.test(name)).sort();
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        throw new ArtifactNotFoundError(id, IMAGES_DIR);
      }
      throw err;
    }
  }

  async readImage(id: string, name: string): Promise<Buffer> {
    if (!SAFE_SEGMENT.test(name)) {
      throw new ArtifactNotFoundError(id, name);
    }
    return this.readOrNotFound(id, path.join(this.namespacePath(id), OUTPUTS_DIR, IMAGES_DIR, name), name);
  }

  /** Idempotent. */
  async remove(id: string): Promise<void> {
    if (!SAFE_SEGMENT.test(id)) {
      return;
    }
    await this.writes.run(id, async () => {
      await this.fs.rm(this.namespacePath(id), { recursive: true, force: true });
    });
  }

  async listNamespaces(): Promise<string[]> {
    try {
      const entries = await this.fs.readdir(this.root, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && SAFE_SEGMENT.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        return [];
      }
      throw err;
    }
  }

  private namespacePath(id: string): string {
    if (!SAFE_SEGMENT.test(id)) {
      throw new ArtifactNotFoundError(id, "namespace");
    }
    return path.join(this.root, id);
  }

  private async requireNamespace(id: string): Promise<void> {
    if (!(await this.exists(this.namespacePath(id)))) {
      throw new ArtifactNotFoundError(id, "namespace");
    }
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await this.fs.stat(target);
      return true;
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        return false;
      }
      throw err;
    }
  }

  private async readOrNotFound(id: string, file: string, artifact: string): Promise<Buffer> {
    try {
      return await this.fs.readFile(file);
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        throw new ArtifactNotFoundError(id, artifact);
      }
      throw err;
    }
  }
}
