import express, { Router, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { AppError } from "../middleware/errors";
import { safeHandler } from "../middleware/safeHandler";
import { type JobService, type ResultReadiness } from "../modules/jobs/jobs.service";
import { type Job, JOB_STATUSES } from "../modules/jobs/jobs.types";

const listJobsQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
});

const DEFAULT_RAW_FILENAME = "document.pdf";

export type JobsRouterOptions = {
  maxDocumentBytes: number;
};

export function serializeJob(job: Job) {
  return {
    id: job.id,
    status: job.status,
    filename: job.filename,
    fileHash: job.fileHash,
    totalUnits: job.totalUnits,
    processedUnits: job.processedUnits,
    errorMessage: job.errorMessage,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}

function sendNotReady(res: Response, readiness: ResultReadiness): void {
  const { job } = readiness;
  if (readiness.state === "failed") {
    res.status(500).json({
      code: "job_failed",
      id: job.id,
      status: job.status,
      message: `Processing failed: ${readiness.errorMessage}`,
      requestId: res.locals.requestId ?? "unknown",
    });
    return;
  }
  res.status(202).json({
    id: job.id,
    status: job.status,
    message: job.status === "pending" ? "Processing not started yet" : "Processing in progress",
    totalUnits: job.totalUnits,
    processedUnits: job.processedUnits,
  });
}

function readUpload(req: Request): { filename: string; bytes: Buffer } {
  if (req.file) {
    return { filename: req.file.originalname, bytes: req.file.buffer };
  }
  if (Buffer.isBuffer(req.body) && req.is("application/pdf")) {
    const header = req.get("x-filename")?.trim();
    let filename = DEFAULT_RAW_FILENAME;
    if (header) {
      try {
        filename = decodeURIComponent(header);
      } catch {
        throw new AppError("validation_error", "x-filename header is not valid URI encoding.", 400);
      }
    }
    return { filename, bytes: req.body };
  }
  throw new AppError("validation_error", "file is required.", 400);
}

export function createJobsRouter(service: JobService, options: JobsRouterOptions): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxDocumentBytes, files: 1 },
  });
  const rawPdf = express.raw({ type: "application/pdf", limit: options.maxDocumentBytes });

  const parseDocument = (req: Request, res: Response, next: NextFunction): void => {
    if (req.is("multipart/form-data")) {
      upload.single("file")(req, res, next);
      return;
    }
    rawPdf(req, res, next);
  };

  router.post(
    "/jobs",
    parseDocument,
    safeHandler(async (req, res) => {
      const { filename, bytes } = readUpload(req);
      const job = await service.submitJob(filename, bytes);
      res.status(202).json({
        id: job.id,
        status: job.status,
        message: `Processing queued. Poll /jobs/${job.id}/status for progress.`,
      });
    })
  );

  router.get(
    "/jobs",
    safeHandler(async (req, res) => {
      const parsed = listJobsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw new AppError(
          "validation_error",
          `status must be one of: ${JOB_STATUSES.join(", ")}.`,
          400
        );
      }
      const jobs = await service.listJobs(parsed.data.status);
      res.json({ jobs: jobs.map(serializeJob), count: jobs.length });
    })
  );

  router.get(
    "/jobs/:id/status",
    safeHandler(async (req, res) => {
      const job = await service.getStatus(req.params.id);
      res.json(serializeJob(job));
    })
  );

  router.get(
    "/jobs/:id/result/:kind",
    safeHandler(async (req, res) => {
      const { id, kind } = req.params;
      if (kind === "images") {
        const images = await service.listImages(id);
        if (images.state !== "ready") {
          sendNotReady(res, images);
          return;
        }
        res.json({ id, status: images.job.status, images: images.images, count: images.images.length });
        return;
      }

      const result = await service.getResult(id, kind);
      if (result.state !== "ready") {
        sendNotReady(res, result);
        return;
      }
      if (result.kind === "layout_pdf") {
        res.type("application/pdf");
        res.attachment(`layout_${id}.pdf`);
        res.send(result.content);
        return;
      }
      res.json({
        id,
        status: result.job.status,
        kind: result.kind,
        content: result.content.toString("utf8"),
      });
    })
  );

  router.get(
    "/jobs/:id/images/:name",
    safeHandler(async (req, res) => {
      const image = await service.getImage(req.params.id, req.params.name);
      if (image.state !== "ready") {
        sendNotReady(res, image);
        return;
      }
      res.type("image/jpeg");
      res.send(image.content);
    })
  );

  router.delete(
    "/jobs/:id",
    safeHandler(async (req, res) => {
      await service.deleteJob(req.params.id);
      res.json({ id: req.params.id, status: "deleted" });
    })
  );

  router.get("/queue/status", (_req, res) => {
    res.json(service.queueStatus());
  });

  return router;
}
