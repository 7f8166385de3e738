import express from "express";
import cors from "cors";
import { requireBearerToken } from "./middleware/auth";
import { errorHandler, notFoundHandler } from "./middleware/errors";
import { requestId } from "./middleware/requestId";
import { requestLogger } from "./middleware/requestLogger";
import { type JobService } from "./modules/jobs/jobs.service";
import { createHealthRouter } from "./routes/health";
import { createJobsRouter } from "./routes/jobs";

export type AppOptions = {
  jobService: JobService;
  /** Unset disables authentication. */
  authToken?: string;
  maxDocumentBytes: number;
  corsAllowedOrigins?: string[];
};

export function buildApp(options: AppOptions): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  app.use(requestId);
  app.use(requestLogger);

  const origins = options.corsAllowedOrigins ?? [];
  app.use(cors({ origin: origins.length > 0 ? origins : false }));

  app.use(createHealthRouter(options.jobService));

  app.use(requireBearerToken(options.authToken));
  app.use(createJobsRouter(options.jobService, { maxDocumentBytes: options.maxDocumentBytes }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
