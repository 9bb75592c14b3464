import { AsyncLocalStorage } from "node:async_hooks";
import type { HttpRequest, HttpResponse, SwitchyardLogger } from "@switchyard/types";

export type RequestContext = {
  readonly request: HttpRequest;
  readonly response: HttpResponse;
  readonly locale: string;
  readonly logger: SwitchyardLogger;
};

const requestContextStore = new AsyncLocalStorage<RequestContext>();

/**
 * Binds the context for the duration of `fn`, including everything it
 * awaits. Whatever was bound before is visible again once `fn` settles.
 */
export function runWithRequestContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return requestContextStore.run(context, fn);
}

/** The request being dispatched, or undefined outside a dispatch pass. */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStore.getStore();
}

/** Locale of the request being dispatched. */
export function getLocale(): string | undefined {
  return requestContextStore.getStore()?.locale;
}
