/** Largest delay `setTimeout` honours; longer ones fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Runs `task` with an abort signal that fires after `ms`. A non-positive `ms`
 * disables the deadline. The returned promise rejects with TimeoutError on
 * expiry even if the task ignores the signal.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label = "operation"
): Promise<T> {
  const controller = new AbortController();
  if (ms <= 0) {
    return task(controller.signal);
  }
  const delay = Math.min(ms, MAX_TIMEOUT_MS);
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, ms);
      controller.abort(error);
      reject(error);
    }, delay);
  });
  return Promise.race([task(controller.signal), deadline]).finally(() => {
    clearTimeout(timer);
  });
}
