import { AsyncLocalStorage } from "async_hooks";

export type RequestContext = {
  requestId: string;
  route?: string;
  start: number;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

/** Runs `fn` with no request context, for work that outlives the request. */
export function runOutsideRequestContext<T>(fn: () => T): T {
  return storage.exit(fn);
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getRequestRoute(): string | undefined {
  return storage.getStore()?.route;
}
