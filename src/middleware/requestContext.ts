import { AsyncLocalStorage } from "async_hooks";

export type RequestContext = {
  requestId: string;
  route?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getRequestRoute(): string | undefined {
  return storage.getStore()?.route;
}

export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run({ ...ctx }, fn);
}
