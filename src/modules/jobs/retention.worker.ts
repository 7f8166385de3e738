import { errorMessage, logError } from "../../observability/logger";
import { type JobService } from "./jobs.service";

export type RetentionWorkerOptions = {
  retentionDays: number;
  intervalMs: number;
};

export function startRetentionWorker(
  service: Pick<JobService, "purgeExpiredJobs">,
  options: RetentionWorkerOptions
): { stop: () => void } {
  let stopped = false;
  let running = false;

  const tick = async () => {
    if (stopped || running) {
      return;
    }
    running = true;
    try {
      await service.purgeExpiredJobs(options.retentionDays);
    } catch (err) {
      logError("job_retention_sweep_failed", { error: errorMessage(err) });
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, options.intervalMs);
  timer.unref();

  void tick();

  return {
    stop: () => {
      stopped = true;
      clearInterval(timer);
    },
  };
}
