import { errorMessage, logError } from "./logger";

let handlersInstalled = false;

export function installProcessHandlers(): void {
  if (handlersInstalled) {
    return;
  }
  handlersInstalled = true;

  process.on("unhandledRejection", (reason) => {
    logError("unhandled_rejection", {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  process.on("uncaughtException", (error) => {
    logError("uncaught_exception", { error: error.message, stack: error.stack });
    process.exit(1);
  });
}
