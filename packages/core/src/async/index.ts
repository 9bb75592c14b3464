export { DeferredResult } from "./deferred-result";
export type { DeferredOutcome, DeferredResultOptions } from "./deferred-result";
export { AsyncManager, getAsyncManager } from "./async-manager";
export type { AsyncDispatchOutcome, ConcurrentResult } from "./async-manager";
