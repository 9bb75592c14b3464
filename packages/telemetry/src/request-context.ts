import { AsyncLocalStorage } from "node:async_hooks";
import type { SwitchyardLogger } from "@switchyard/types";
import { SILENT_LOGGER } from "./noop";

export type DispatchScope = {
  requestId: string;
  logger: SwitchyardLogger;
};

export const requestStore = new AsyncLocalStorage<DispatchScope>();

/**
 * The logger bound to the dispatch pass running in the current async
 * context, or `undefined` outside one (startup code, timers of a
 * finished pass).
 */
export function getRequestLogger(): SwitchyardLogger | undefined {
  return requestStore.getStore()?.logger;
}

/** Like {@link getRequestLogger}, but never undefined. */
export function currentLogger(): SwitchyardLogger {
  return getRequestLogger() ?? SILENT_LOGGER;
}

export function getRequestId(): string | undefined {
  return requestStore.getStore()?.requestId;
}
