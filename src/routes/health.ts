import { Router } from "express";
import { safeHandler } from "../middleware/safeHandler";
import { type JobService } from "../modules/jobs/jobs.service";

export const SERVICE_NAME = "pdf-ocr-jobs";

export function createHealthRouter(service: Pick<JobService, "health">): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ service: SERVICE_NAME, status: "running" });
  });

  router.get(
    "/health",
    safeHandler(async (_req, res) => {
      res.json(await service.health());
    })
  );

  return router;
}
